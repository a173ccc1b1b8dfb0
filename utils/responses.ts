/**
 * HTTP 响应信封
 * 成功：{ success: true, message, data, meta? }
 * 失败：{ success: false, error: { code, message, details? } }
 */

export interface SuccessEnvelope<T> {
  success: true;
  message: string;
  data: T;
  meta?: Record<string, unknown>;
}

export interface ErrorEnvelope {
  success: false;
  error: {
    code: string;
    message: string;
    details?: Record<string, unknown>;
  };
}

export function successResponse<T>(
  data: T,
  message: string,
  meta?: Record<string, unknown>
): SuccessEnvelope<T> {
  return meta ? { success: true, message, data, meta } : { success: true, message, data };
}

export function errorResponse(code: string, message: string, details?: Record<string, unknown>): ErrorEnvelope {
  return {
    success: false,
    error: details ? { code, message, details } : { code, message },
  };
}
