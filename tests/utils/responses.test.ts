/**
 * 响应信封单元测试
 */

import { describe, expect, test } from 'vitest';
import { errorResponse, successResponse } from '../../utils/responses';

describe('responses', () => {
  test('successResponse should omit meta when not given', () => {
    expect(successResponse({ n: 1 }, 'done')).toEqual({ success: true, message: 'done', data: { n: 1 } });
  });

  test('successResponse should include meta', () => {
    expect(successResponse([], 'done', { attempts: 2 })).toEqual({
      success: true,
      message: 'done',
      data: [],
      meta: { attempts: 2 },
    });
  });

  test('errorResponse should nest code and message', () => {
    expect(errorResponse('NOT_FOUND', 'Route not found')).toEqual({
      success: false,
      error: { code: 'NOT_FOUND', message: 'Route not found' },
    });
    expect(errorResponse('VALIDATION_ERROR', 'bad', { field: 'query' }).error.details).toEqual({ field: 'query' });
  });
});
