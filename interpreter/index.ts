import type { StreamEncoding } from '@core/types/events';
import type { TranslationVerifier } from '@core/types/harness';
import type { IFileSystemService } from '@services/fs/IFileSystemService';
import { NodeFileSystem } from '@services/fs/NodeFileSystem';
import { YamlEventSource, decodeDocument } from '@services/yaml/YamlEventSource';
import { createRunContext, type RunLimits } from './context';
import { DocumentDriver, type DocumentDriverOptions, type RunResult } from './DocumentDriver';

export type { RunResult } from './DocumentDriver';

export interface CheckOptions extends DocumentDriverOptions {
  verifier: TranslationVerifier;
  /** Path used in diagnostics; defaults to `<input>` for in-memory text */
  filePath?: string;
  /** Encoding reported in the `Encoding` line */
  encoding?: StreamEncoding;
  print?: (line: string) => void;
  limits?: Partial<RunLimits>;
}

export interface CheckFileOptions extends Omit<CheckOptions, 'filePath' | 'encoding'> {
  fileSystem?: IFileSystemService;
}

/**
 * Check a test document held in memory.
 *
 * Throws a GrammarViolation when the document does not follow the test
 * grammar; translation mismatches are counted in the result instead.
 */
export function checkSource(text: string, options: CheckOptions): RunResult {
  const context = createRunContext({
    filePath: options.filePath ?? '<input>',
    verifier: options.verifier,
    print: options.print,
    limits: options.limits
  });
  const source = new YamlEventSource(text, options.encoding);
  return new DocumentDriver(source, context, { paintStatus: options.paintStatus }).run();
}

/**
 * Read and check a test document from disk.
 */
export async function checkFile(filePath: string, options: CheckFileOptions): Promise<RunResult> {
  const fileSystem = options.fileSystem ?? new NodeFileSystem();
  const { text, encoding } = decodeDocument(await fileSystem.readBytes(filePath));
  return checkSource(text, { ...options, filePath, encoding });
}
