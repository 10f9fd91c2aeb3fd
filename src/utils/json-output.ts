/**
 * JSON Output Utilities
 * Helpers for formatting command output as JSON
 */

export interface JsonResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  command?: string;
  timestamp: string;
}

/**
 * Create a successful JSON response
 */
export function jsonSuccess<T>(data: T): JsonResponse<T> {
  return {
    success: true,
    data,
    timestamp: new Date().toISOString(),
  };
}

/**
 * Create an error JSON response
 */
export function jsonError(error: string | Error, command?: string): JsonResponse<never> {
  return {
    success: false,
    error: typeof error === 'string' ? error : error.message,
    ...(command ? { command } : {}),
    timestamp: new Date().toISOString(),
  };
}

/**
 * Output JSON response to console
 */
export function outputJson<T>(response: JsonResponse<T>): void {
  console.log(JSON.stringify(response, null, 2));
}
