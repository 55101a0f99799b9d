import { ConfigurationError } from "./errors";

export type Image = {
  /** container image reference passed to `run` */
  id: string;
  /** commands run once inside a new container, in order */
  setup: string[];
};

const APT_PACKAGES =
  "build-essential git ninja-build python3 python3-pip python3-venv nodejs npm";

export const IMAGES: Readonly<Record<string, Image>> = {
  debian: {
    id: "docker.io/library/debian:bookworm",
    setup: ["apt-get update", `DEBIAN_FRONTEND=noninteractive apt-get install -y ${APT_PACKAGES}`],
  },
  ubuntu: {
    id: "docker.io/library/ubuntu:24.04",
    setup: ["apt-get update", `DEBIAN_FRONTEND=noninteractive apt-get install -y ${APT_PACKAGES}`],
  },
  fedora: {
    id: "registry.fedoraproject.org/fedora:40",
    setup: ["dnf install -y gcc gcc-c++ make git ninja-build python3 python3-pip nodejs npm"],
  },
};

export const DEFAULT_IMAGE = "debian";

/** Built-in images overlaid with user-defined ones. */
export function imageRegistry(
  extra: Readonly<Record<string, Image>> = {},
): Readonly<Record<string, Image>> {
  return { ...IMAGES, ...extra };
}

export function resolveImage(
  name: string,
  registry: Readonly<Record<string, Image>> = IMAGES,
): Image {
  const image = Object.prototype.hasOwnProperty.call(registry, name) ? registry[name] : undefined;
  if (!image) {
    const available = Object.keys(registry).sort().join(", ");
    throw new ConfigurationError(`Invalid image '${name}', available options are: ${available}`);
  }
  return image;
}
