import * as fsExtra from 'fs-extra';
import type { IFileSystemService } from './IFileSystemService';

/**
 * Adapter to use Node's fs-extra as our IFileSystemService implementation
 */
export class NodeFileSystem implements IFileSystemService {
  async readFile(filePath: string): Promise<string> {
    return fsExtra.readFile(filePath, 'utf-8');
  }

  async readBinary(filePath: string): Promise<Uint8Array> {
    return fsExtra.readFile(filePath);
  }

  async writeFile(filePath: string, content: string): Promise<void> {
    await fsExtra.outputFile(filePath, content, 'utf-8');
  }

  async exists(filePath: string): Promise<boolean> {
    return fsExtra.pathExists(filePath);
  }

  async isFile(filePath: string): Promise<boolean> {
    try {
      const stats = await fsExtra.stat(filePath);
      return stats.isFile();
    } catch (error) {
      if (isMissing(error)) {
        return false;
      }
      throw error;
    }
  }

  async isDirectory(filePath: string): Promise<boolean> {
    try {
      const stats = await fsExtra.stat(filePath);
      return stats.isDirectory();
    } catch (error) {
      if (isMissing(error)) {
        return false;
      }
      throw error;
    }
  }

  async mkdir(dirPath: string): Promise<void> {
    await fsExtra.ensureDir(dirPath);
  }

  async remove(targetPath: string): Promise<void> {
    await fsExtra.remove(targetPath);
  }
}

function isMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'ENOTDIR');
}
