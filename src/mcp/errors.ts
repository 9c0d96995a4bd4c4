import { McpError, ErrorCode } from '@modelcontextprotocol/sdk/types.js';

export class ExtractionError extends McpError {
  constructor(message: string, url?: string) {
    const urlInfo = url ? ` for URL: ${url}` : '';
    super(ErrorCode.InternalError, `Content extraction failed: ${message}${urlInfo}`);
  }
}

export class ValidationError extends McpError {
  constructor(message: string) {
    super(ErrorCode.InvalidParams, `Validation error: ${message}`);
  }
}

export class ConfigurationError extends McpError {
  constructor(message: string) {
    super(ErrorCode.InternalError, `Configuration error: ${message}`);
  }
}

export function handleMcpError(error: unknown, context?: string): McpError {
  if (error instanceof McpError) {
    return error;
  }

  const prefix = context ? `${context}: ` : '';

  if (error instanceof Error) {
    return new McpError(ErrorCode.InternalError, `${prefix}${error.message}`);
  }

  return new McpError(ErrorCode.InternalError, `${prefix}Unknown error occurred`);
}
