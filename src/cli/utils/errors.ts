import chalk from 'chalk';
import { ServerMaintenanceError, isWorkflowError } from '../../lib/index.js';

const KIND_LABEL = {
  precondition: 'Precondition failed',
  retriable: 'Gave up after retries',
  restart: 'Validation kept failing',
  fatal: 'Failed',
} as const;

/** Central error handler for CLI commands, aware of workflow error kinds. */
export function handleError(error: unknown): void {
  if (error instanceof ServerMaintenanceError) {
    console.error('\n' + chalk.yellow('Service Maintenance'));
    console.error('The ACME server is currently under maintenance. Try again later.');
    console.error(chalk.gray(error.detail));
  } else if (isWorkflowError(error)) {
    console.error(chalk.red(`${KIND_LABEL[error.kind]}:`), error.message);
    console.error(chalk.gray(`code: ${error.code}`));
  } else if (error instanceof Error) {
    console.error(chalk.red('Error:'), error.message);
  } else {
    console.error('Unknown error:', error);
  }
}
