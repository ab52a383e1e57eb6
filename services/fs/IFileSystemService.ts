/**
 * File system surface used by the checker
 */
export interface IFileSystemService {
  /** Raw bytes, so the encoding can be detected from a byte-order mark */
  readBytes(filePath: string): Promise<Uint8Array>;
}
