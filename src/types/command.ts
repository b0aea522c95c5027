/**
 * A structured command ready for execution.
 * Lab modules never build shell strings; they produce Command objects.
 */
export interface Command {
  readonly argv: readonly string[];
  readonly env?: Record<string, string>;
  readonly stdin?: string;
}
