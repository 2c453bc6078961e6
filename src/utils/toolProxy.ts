import { logger, LogContext } from './logger';

const SNIPPET_LENGTH = 200;

export function resultSnippet(result: unknown): string {
  const text = typeof result === 'string' ? result : JSON.stringify(result) ?? String(result);
  return text.length > SNIPPET_LENGTH ? `${text.substring(0, SNIPPET_LENGTH)}...` : text;
}

/**
 * Wraps a tool handler so every call and its result (or failure) is logged
 * as `tool_call` / `tool_result` / `error` events
 */
export function withToolLogging<P, R>(
  toolName: string,
  handler: (params: P) => Promise<R>,
  context: LogContext = {}
): (params: P) => Promise<R> {
  return async (params: P) => {
    logger.logToolCall(toolName, params, context);

    try {
      const result = await handler(params);
      logger.logToolResult(toolName, resultSnippet(result), context);
      return result;
    } catch (error) {
      logger.logError(error as Error, {
        ...context,
        toolName,
        operation: 'tool_execution'
      });
      throw error;
    }
  };
}
