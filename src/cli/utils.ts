/**
 * CLI output helpers
 */

/**
 * Print to stdout
 */
export function print(message: string): void {
  process.stdout.write(message + '\n')
}

/**
 * Print to stderr
 */
export function printError(message: string): void {
  process.stderr.write('Error: ' + message + '\n')
}

/**
 * Print success message
 */
export function printSuccess(message: string): void {
  process.stdout.write('OK ' + message + '\n')
}
