/** user-facing progress output */
export interface Reporter {
  /** start a step: prints `<label>... ` without a newline */
  progress(label: string): void;
  /** finish the current step */
  done(): void;
  warn(message: string): void;
  info(message: string): void;
}

type OutputStream = {
  write(chunk: string): boolean;
  isTTY?: boolean;
};

const BOLD = "\x1b[1m";
const GREEN = "\x1b[32m";
const YELLOW = "\x1b[33m";
const RESET = "\x1b[0m";

function useColor(stream: OutputStream): boolean {
  return Boolean(stream.isTTY) && process.env.NO_COLOR === undefined;
}

export function createTerminalReporter(
  stream: OutputStream = process.stdout,
  errStream: OutputStream = process.stderr,
): Reporter {
  const color = useColor(stream);
  const paint = (code: string, text: string) => (color ? `${code}${text}${RESET}` : text);
  // a warning printed mid-step must not land on the progress line
  let pending = false;

  const breakLine = () => {
    if (!pending) return;
    stream.write("\n");
    pending = false;
  };

  return {
    progress(label) {
      breakLine();
      stream.write(paint(BOLD, `${label}... `));
      pending = true;
    },
    done() {
      stream.write(`${paint(GREEN, "Done")}\n`);
      pending = false;
    },
    warn(message) {
      breakLine();
      errStream.write(`${paint(YELLOW, "warning:")} ${message}\n`);
    },
    info(message) {
      breakLine();
      stream.write(`${message}\n`);
    },
  };
}

export const silentReporter: Reporter = {
  progress() {},
  done() {},
  warn() {},
  info() {},
};
