/**
 * Error Handler
 * Provides standardized error categorization and response formatting
 */

import type { MCPToolResponse } from '../types/mcp.types.js';

export enum ErrorCategory {
  AUTHENTICATION = 'authentication',
  RATE_LIMIT = 'rate_limit',
  NETWORK = 'network',
  API_ERROR = 'api_error',
  VALIDATION = 'validation',
  DATA = 'data',
  CONFIGURATION = 'configuration',
  SYSTEM = 'system'
}

export interface CategorizedError {
  category: ErrorCategory;
  message: string;
  originalError?: Error;
  context?: Record<string, unknown>;
}

export class ToolError extends Error {
  public readonly category: ErrorCategory;
  public readonly context?: Record<string, unknown>;

  constructor(category: ErrorCategory, message: string, context?: Record<string, unknown>, originalError?: Error) {
    super(message);
    this.name = 'ToolError';
    this.category = category;
    this.context = context;

    if (originalError && originalError.stack) {
      this.stack = originalError.stack;
    }
  }
}

/**
 * Raised by the tool layer when every resolution strategy came up empty
 */
export class UnresolvedStationError extends ToolError {
  public readonly query: string;

  constructor(query: string, failures: string[] = []) {
    super(ErrorCategory.DATA, `Could not resolve station "${query}"`, { query, failures });
    this.name = 'UnresolvedStationError';
    this.query = query;
  }
}

export class ErrorHandler {
  private sessionId: string;

  constructor(sessionId: string) {
    this.sessionId = sessionId;
  }

  /**
   * Categorize an error based on its properties and context
   */
  categorizeError(error: unknown, context?: Record<string, unknown>): CategorizedError {
    if (error instanceof ToolError) {
      return {
        category: error.category,
        message: error.message,
        originalError: error,
        context: { ...error.context, ...context }
      };
    }

    let category = ErrorCategory.SYSTEM;
    let message = 'An unexpected error occurred';

    if (error instanceof Error) {
      message = error.message;
      const lower = message.toLowerCase();

      if (lower.includes('unauthorized') || lower.includes('401') || lower.includes('forbidden')) {
        category = ErrorCategory.AUTHENTICATION;
      } else if (lower.includes('rate limit') || lower.includes('429')) {
        category = ErrorCategory.RATE_LIMIT;
      } else if (error.name === 'AbortError' || error.name === 'TimeoutError' ||
                 lower.includes('network') || lower.includes('timeout') ||
                 lower.includes('enotfound') || lower.includes('econnrefused') || lower.includes('fetch failed')) {
        category = ErrorCategory.NETWORK;
      } else if (lower.includes('invalid') || lower.includes('missing') || lower.includes('must be')) {
        category = ErrorCategory.VALIDATION;
      } else if (lower.includes('not found') || lower.includes('parse') || lower.includes('json')) {
        category = ErrorCategory.DATA;
      }
    }

    return {
      category,
      message,
      originalError: error instanceof Error ? error : undefined,
      context
    };
  }

  /**
   * Create a standardized error response for MCP tools
   */
  createErrorResponse(categorizedError: CategorizedError, toolName: string): MCPToolResponse {
    let errorMessage: string;
    let suggestions: string[];

    switch (categorizedError.category) {
      case ErrorCategory.AUTHENTICATION:
        errorMessage = 'Authentication problem';
        suggestions = ['• Check that the API key or token is valid and has not expired'];
        break;

      case ErrorCategory.RATE_LIMIT:
        errorMessage = 'Rate limit reached';
        suggestions = ['• Wait a little before trying again'];
        break;

      case ErrorCategory.NETWORK:
        errorMessage = 'Network problem';
        suggestions = ['• The upstream service did not answer in time, try again shortly'];
        break;

      case ErrorCategory.API_ERROR:
        errorMessage = 'Upstream API error';
        suggestions = ['• The upstream service rejected the request or is unavailable'];
        break;

      case ErrorCategory.VALIDATION:
        errorMessage = 'Invalid input';
        suggestions = this.getValidationSuggestions(toolName);
        break;

      case ErrorCategory.DATA:
        errorMessage = 'Nothing usable found';
        suggestions = this.getDataErrorSuggestions(toolName);
        break;

      case ErrorCategory.CONFIGURATION:
        errorMessage = 'Integration not configured';
        suggestions = ['• Set the required environment variables and restart the server'];
        break;

      default:
        errorMessage = `${toolName} failed`;
        suggestions = ['• Try again later'];
    }

    const responseText = `Error (${errorMessage}): ${categorizedError.message}\n\n` +
      `Suggestions:\n${suggestions.join('\n')}`;

    return {
      content: [{
        type: 'text',
        text: responseText
      }],
      isError: true
    };
  }

  /**
   * Log error with structured format
   */
  logError(message: string, error?: unknown, context?: Record<string, unknown>): void {
    this.writeLog('error', message, error, context);
  }

  logWarning(message: string, context?: Record<string, unknown>): void {
    this.writeLog('warn', message, undefined, context);
  }

  logInfo(message: string, context?: Record<string, unknown>): void {
    this.writeLog('info', message, undefined, context);
  }

  private writeLog(level: 'info' | 'warn' | 'error', message: string, error?: unknown, context?: Record<string, unknown>): void {
    const logEntry = {
      timestamp: new Date().toISOString(),
      level,
      sessionId: this.sessionId,
      message,
      error: error instanceof Error ? {
        name: error.name,
        message: error.message,
        stack: error.stack
      } : error,
      context
    };

    // stdout carries the stdio transport, so every level goes to stderr
    console.error(JSON.stringify(logEntry));
  }

  private getValidationSuggestions(toolName: string): string[] {
    const baseSuggestions = ['• Check the argument names and formats'];

    if (toolName.startsWith('ns_')) {
      return [
        ...baseSuggestions,
        '• Stations can be given as a name ("Utrecht Centraal"), a code ("UT") or a UIC number',
        '• Date-times use ISO 8601, e.g. 2024-05-01T08:30'
      ];
    }
    if (toolName.startsWith('obsidian_')) {
      return [...baseSuggestions, '• Dates use YYYY-MM-DD, note paths are relative to the vault root'];
    }
    if (toolName.startsWith('airlabs_')) {
      return [...baseSuggestions, '• Use IATA codes such as "KL601" for flights and "AMS" for airports'];
    }
    if (toolName === 'weather_forecast') {
      return [...baseSuggestions, '• Latitude lies in [-90, 90], longitude in [-180, 180]'];
    }
    return baseSuggestions;
  }

  private getDataErrorSuggestions(toolName: string): string[] {
    if (toolName.startsWith('ns_')) {
      return [
        '• Use ns_get_stations to look up the exact station name or code',
        '• Try the official station name or its short code'
      ];
    }
    if (toolName.startsWith('obsidian_')) {
      return ['• Use obsidian_search_notes to find the exact note path'];
    }
    return ['• Try a more specific query'];
  }
}
