import chalk from 'chalk';
import { CheckError, GrammarViolation } from '@core/errors';
import { logger } from '@core/utils/logger';

export interface ErrorOutput {
  /** Harness output; grammar diagnostics belong with it */
  print: (line: string) => void;
  printError: (line: string) => void;
}

export class ErrorHandler {
  constructor(
    private readonly output: ErrorOutput = {
      print: line => console.log(line),
      printError: line => console.error(line)
    }
  ) {}

  /**
   * Report an error and return the exit status it maps to.
   */
  handleError(error: unknown): number {
    if (error instanceof GrammarViolation) {
      this.output.print(error.toDiagnostic());
      return 1;
    }

    if (error instanceof CheckError) {
      this.handleCheckError(error);
      return 1;
    }

    if (error instanceof Error) {
      this.handleGenericError(error);
      return 1;
    }

    this.handleUnknownError(error);
    return 1;
  }

  private handleCheckError(error: CheckError): void {
    logger.debug(`Check failed with ${error.severity} error`, error.toJSON());
    this.output.printError(chalk.red('Error: ') + error.message);
  }

  private handleGenericError(error: Error): void {
    logger.debug('An unexpected error occurred', { name: error.name, stack: error.stack });
    this.output.printError(chalk.red('Error: ') + error.message);

    const cause = error.cause;
    if (cause instanceof Error) {
      this.output.printError(chalk.red(`  Cause: ${cause.message}`));
    }
  }

  private handleUnknownError(error: unknown): void {
    logger.error('An unknown error occurred', { error: String(error) });
    this.output.printError(chalk.red(`Unknown Error: ${String(error)}`));
  }
}
