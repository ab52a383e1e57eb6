import { CLIOrchestrator, type CLIDependencies } from './CLIOrchestrator';

// CLI Options interface
export interface CLIOptions {
  /** Positional arguments; exactly one document path is expected */
  inputs: string[];
  translator?: string;
  verbose?: boolean;
  debug?: boolean;
  version?: boolean;
  help?: boolean;
}

export type { CLIDependencies } from './CLIOrchestrator';

/**
 * Entry point for the brl-yaml-check CLI. Resolves to the exit status.
 */
export async function main(customArgs?: string[], dependencies?: CLIDependencies): Promise<number> {
  const orchestrator = new CLIOrchestrator(dependencies);
  return await orchestrator.main(customArgs ?? process.argv.slice(2));
}
