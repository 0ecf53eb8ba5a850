export interface StackFrame {
  /** Call descriptor, e.g. `TestProjectsController.findOne`. Empty for anonymous frames. */
  descriptor: string;
  /** File path or `file://` URL as printed by the runtime */
  path: string;
  line: number;
  column?: number;
}

export interface SourceLocation {
  /** Final path segment only */
  file: string;
  line: number;
}
