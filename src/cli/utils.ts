import chalk from 'chalk';

/**
 * CLI Utilities
 */

/** Width of divider lines and headers */
const LINE_WIDTH = 60;

// Styling helpers
export const styles = {
  header: (text: string) => chalk.bold.cyan(`\n${'═'.repeat(LINE_WIDTH)}\n  ${text}\n${'═'.repeat(LINE_WIDTH)}\n`),
  success: (text: string) => chalk.green(`✓ ${text}`),
  error: (text: string) => chalk.red(`✗ ${text}`),
  info: (text: string) => chalk.blue(`ℹ ${text}`),
  dim: (text: string) => chalk.dim(text),
  step: (num: number, text: string) => chalk.cyan(`[${num}] ${text}`),
};

/**
 * Print a formatted header
 */
export function printHeader(title: string): void {
  console.log(styles.header(title));
}

/**
 * Print step progress
 */
export function printStep(step: number, message: string): void {
  console.log(styles.step(step, message));
}

/**
 * Print success message
 */
export function printSuccess(message: string): void {
  console.log(styles.success(message));
}

/**
 * Print error message
 */
export function printError(message: string): void {
  console.log(styles.error(message));
}

/**
 * Print info message
 */
export function printInfo(message: string): void {
  console.log(styles.info(message));
}

/**
 * Print dimmed text as is
 */
export function printRaw(message: string): void {
  console.log(styles.dim(message));
}

/**
 * Print a divider line
 */
export function printDivider(): void {
  console.log(chalk.gray('─'.repeat(LINE_WIDTH)));
}
