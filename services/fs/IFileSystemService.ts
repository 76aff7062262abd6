/**
 * File system operations the evaluation pipeline performs itself.
 * The compiler reads and writes through its own host.
 */
export interface IFileSystemService {
  readFile(filePath: string): Promise<string>;
  readBinary(filePath: string): Promise<Uint8Array>;
  /** Writes the file, creating parent directories as needed */
  writeFile(filePath: string, content: string): Promise<void>;
  exists(filePath: string): Promise<boolean>;
  isFile(filePath: string): Promise<boolean>;
  isDirectory(filePath: string): Promise<boolean>;
  mkdir(dirPath: string): Promise<void>;
  /** Removes a file or directory tree; missing paths are not an error */
  remove(targetPath: string): Promise<void>;
}
