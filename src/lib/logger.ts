export const colors = {
  reset: '\x1b[0m',
  bright: '\x1b[1m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  magenta: '\x1b[35m',
  cyan: '\x1b[36m',
  red: '\x1b[31m',
  gray: '\x1b[90m',
};

function tagged(tag: string, color: string): string {
  return `${color}[${tag}]${colors.reset}`;
}

export const logger = {
  info(tag: string, message: string): void {
    console.log(`${tagged(tag, colors.cyan)} ${message}`);
  },
  success(tag: string, message: string): void {
    console.log(`${tagged(tag, colors.green)} ${message}`);
  },
  warn(tag: string, message: string): void {
    console.warn(`${tagged(tag, colors.yellow)} ${message}`);
  },
  error(tag: string, message: string, stack?: string): void {
    console.error(`${tagged(tag, colors.red)} ${message}`);
    if (stack) {
      console.error(`${colors.gray}${stack}${colors.reset}`);
    }
  },
};
