import type { PipelineRenderer } from '../dialect/abstract.js';
import type { PipelineError } from '../errors.js';

/**
 * A clause was validated and appended
 */
export interface AppendLogEntry {
  event: 'append';
  clause: string;
  /** Column names of the schema after the clause */
  columns: string[];
}

/**
 * A clause failed validation; the pipeline is unchanged
 */
export interface RejectLogEntry {
  event: 'reject';
  clause: string;
  error: PipelineError;
}

export interface RenderLogEntry {
  event: 'render';
  dialect: string;
  text: string;
}

/**
 * Represents a single pipeline log entry
 */
export type QueryLogEntry = AppendLogEntry | RejectLogEntry | RenderLogEntry;

/**
 * Function type for pipeline logging callbacks
 * @param entry - The log entry to process
 */
export type QueryLogger = (entry: QueryLogEntry) => void;

/**
 * Creates a wrapped renderer that logs every rendered text
 * @param renderer - Original renderer to wrap
 * @param logger - Optional logger function to receive render log entries
 * @returns Wrapped renderer, or the original one when no logger is given
 */
export const createRenderLoggingRenderer = (
  renderer: PipelineRenderer,
  logger?: QueryLogger
): PipelineRenderer => {
  if (!logger) {
    return renderer;
  }

  const wrapped: PipelineRenderer = {
    name: renderer.name,
    render(pipeline) {
      const text = renderer.render(pipeline);
      logger({ event: 'render', dialect: renderer.name, text });
      return text;
    },
    renderSuffix: clause => renderer.renderSuffix(clause)
  };

  return wrapped;
};
