import chalk from 'chalk';
import { version } from '@core/version';
import { ConfigLoader } from '@core/config/loader';
import type { ResolvedCheckConfig } from '@core/config/types';
import type { IFileSystemService } from '@services/fs/IFileSystemService';
import {
  CommandTranslationVerifier,
  type SpawnFunction
} from '@services/verifier/CommandTranslationVerifier';
import { checkFile } from '@interpreter/index';
import { cliLogger as logger, setLogLevel } from '@core/utils/logger';
import type { CLIOptions } from './index';
import { ErrorHandler } from './error/ErrorHandler';
import { HelpSystem } from './interaction/HelpSystem';
import { ArgumentParser } from './parsers/ArgumentParser';

export interface CLIDependencies {
  print?: (line: string) => void;
  printError?: (line: string) => void;
  configLoader?: ConfigLoader;
  fileSystem?: IFileSystemService;
  spawn?: SpawnFunction;
}

export class CLIOrchestrator {
  private readonly errorHandler: ErrorHandler;
  private readonly helpSystem: HelpSystem;
  private readonly argumentParser: ArgumentParser;
  private readonly print: (line: string) => void;

  constructor(private readonly dependencies: CLIDependencies = {}) {
    this.print = dependencies.print ?? (line => console.log(line));
    this.errorHandler = new ErrorHandler({
      print: this.print,
      printError: dependencies.printError ?? (line => console.error(line))
    });
    this.helpSystem = new HelpSystem(this.print);
    this.argumentParser = new ArgumentParser();
  }

  /**
   * Run the CLI and return the process exit status.
   */
  async main(args: string[]): Promise<number> {
    try {
      const cliOptions = this.argumentParser.parseArgs(args);

      if (cliOptions.version) {
        this.print(`brl-yaml-check version ${version}`);
        return 0;
      }

      if (cliOptions.help) {
        this.helpSystem.displayHelp();
        return 0;
      }

      // A missing or extra document path is reported but is not a failure
      if (cliOptions.inputs.length !== 1) {
        this.helpSystem.displayUsage();
        return 0;
      }

      if (cliOptions.debug) {
        setLogLevel('debug');
      } else if (cliOptions.verbose) {
        setLogLevel('info');
      }

      return await this.processFile(cliOptions.inputs[0], cliOptions);
    } catch (error: unknown) {
      return this.errorHandler.handleError(error);
    }
  }

  private async processFile(filePath: string, cliOptions: CLIOptions): Promise<number> {
    const config = this.resolveConfig(cliOptions);
    logger.info('Checking document', { file: filePath, translator: config.translator.command });

    const verifier = new CommandTranslationVerifier({
      translator: config.translator,
      print: this.print,
      spawn: this.dependencies.spawn
    });

    const result = await checkFile(filePath, {
      verifier,
      print: this.print,
      fileSystem: this.dependencies.fileSystem,
      limits: { maxTableListBytes: config.tables.maxListBytes },
      paintStatus: (status, passed) => (passed ? chalk.green(status) : chalk.red(status))
    });

    return result.exitCode;
  }

  private resolveConfig(cliOptions: CLIOptions): ResolvedCheckConfig {
    const loader = this.dependencies.configLoader ?? new ConfigLoader(process.cwd());
    const config = loader.load();

    if (!cliOptions.translator) {
      return config;
    }
    return {
      ...config,
      translator: { ...config.translator, command: cliOptions.translator }
    };
  }
}
