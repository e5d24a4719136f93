import { accessSync, constants, statSync } from 'fs';
import type { FileInspector } from '../ports/file-inspector.js';

export class NodeFileInspector implements FileInspector {
  isExecutable(path: string): boolean {
    try {
      accessSync(path, constants.X_OK);
      return statSync(path).isFile();
    } catch {
      return false;
    }
  }

  isDirectory(path: string): boolean {
    try {
      return statSync(path).isDirectory();
    } catch {
      return false;
    }
  }
}
