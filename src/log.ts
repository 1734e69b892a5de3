const RESET = "\x1b[0m";
const DIM = "\x1b[2m";
const CYAN = "\x1b[36m";
const GREEN = "\x1b[32m";
const YELLOW = "\x1b[33m";
const RED = "\x1b[31m";
const BOLD = "\x1b[1m";

let verboseEnabled = false;
// When the JSON report goes to stdout, everything else goes to stderr.
let infoToStderr = false;

export function setVerbose(enabled: boolean): void {
  verboseEnabled = enabled;
}

export function setStdoutReserved(reserved: boolean): void {
  infoToStderr = reserved;
}

function write(line: string): void {
  if (infoToStderr) console.error(line);
  else console.log(line);
}

function timestamp(): string {
  return DIM + new Date().toISOString().slice(11, 19) + RESET;
}

export function info(message: string): void {
  write(`${timestamp()} ${CYAN}ℹ${RESET}  ${message}`);
}

export function success(message: string): void {
  write(`${timestamp()} ${GREEN}✔${RESET}  ${message}`);
}

export function warn(message: string): void {
  write(`${timestamp()} ${YELLOW}⚠${RESET}  ${message}`);
}

export function error(message: string): void {
  console.error(`${timestamp()} ${RED}✖${RESET}  ${message}`);
}

export function debug(message: string): void {
  if (verboseEnabled) {
    write(`${timestamp()} ${DIM}·  ${message}${RESET}`);
  }
}

export function heading(message: string): void {
  write(`\n${BOLD}${CYAN}▸ ${message}${RESET}`);
}

export function summary(label: string, value: string | number): void {
  write(`  ${DIM}${label}:${RESET} ${BOLD}${value}${RESET}`);
}

export interface ScopedLog {
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  debug(message: string): void;
}

/** Prefix every line with `[scope]`; repositories are swept concurrently and their lines interleave. */
export function scoped(scope: string): ScopedLog {
  const prefix = `${DIM}[${scope}]${RESET} `;
  return {
    info: (m) => info(prefix + m),
    success: (m) => success(prefix + m),
    warn: (m) => warn(prefix + m),
    error: (m) => error(prefix + m),
    debug: (m) => debug(prefix + m),
  };
}
