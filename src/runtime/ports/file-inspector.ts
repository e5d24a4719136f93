/** Read-only filesystem checks used while resolving the interpreter. */
export interface FileInspector {
  isExecutable(path: string): boolean;
  isDirectory(path: string): boolean;
}
