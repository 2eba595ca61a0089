/**
 * Standard response wrapper for successful API calls
 */
export interface ApiResponse<T = unknown> {
  success: true;
  timestamp: number;
  requestId?: string;
  responseTime?: number;
  data: T;
}
