/**
 * A structured command ready for execution.
 * Tool modules never build raw command strings — they produce Command objects.
 */
export interface Command {
  readonly argv: string[];
  readonly cwd?: string;
}
