// ANSI color codes
const colors = {
  reset: '\x1b[0m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  magenta: '\x1b[35m',
  cyan: '\x1b[36m',
  gray: '\x1b[90m',
  bold: '\x1b[1m'
} as const;

export function printInfo(message: string): void {
  console.log(`${colors.blue}ℹ️  ${message}${colors.reset}`);
}

export function printSuccess(message: string): void {
  console.log(`${colors.green}✅ ${message}${colors.reset}`);
}

export function printWarning(message: string): void {
  console.warn(`${colors.yellow}⚠️  ${message}${colors.reset}`);
}

/**
 * Errors always go to stderr so they stay visible when stdout is piped.
 */
export function printError(message: string): void {
  console.error(`${colors.red}❌ ${message}${colors.reset}`);
}

export function printProgress(message: string): void {
  console.log(`${colors.magenta}🚀 ${message}${colors.reset}`);
}
