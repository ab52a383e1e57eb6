/**
 * Configuration types for brl-yaml-check
 */

export interface CheckConfig {
  translator?: TranslatorConfig;
  tables?: TablesConfig;
}

export interface TranslatorConfig {
  /** Executable run for each test case, e.g. "lou_translate" */
  command?: string;
  /** Arguments placed before the table list */
  args?: string[];
  /** Exported as LOUIS_TABLEPATH to the translator */
  tablePath?: string;
  /** Milliseconds before a translator invocation is killed */
  timeout?: number;
}

export interface TablesConfig {
  /** Capacity of the comma-joined table list, in bytes */
  maxListBytes?: number;
}

// Runtime configuration after parsing and merging
export interface ResolvedTranslatorConfig {
  command: string;
  args: string[];
  tablePath?: string;
  timeout: number;
}

export interface ResolvedCheckConfig {
  translator: ResolvedTranslatorConfig;
  tables: {
    maxListBytes: number;
  };
}

export const DEFAULT_CONFIG: ResolvedCheckConfig = {
  translator: {
    command: 'lou_translate',
    args: ['--forward'],
    timeout: 30000
  },
  tables: {
    maxListBytes: 512
  }
};
