import * as fs from 'fs/promises';
import type { IFileSystemService } from './IFileSystemService';

/**
 * Node.js file system implementation
 */
export class NodeFileSystem implements IFileSystemService {
  async readBytes(filePath: string): Promise<Uint8Array> {
    return await fs.readFile(filePath);
  }
}
