/**
 * Unit tests for withDeadline
 */

import { describe, it, expect, vi } from 'vitest';
import { DeadlineExceededError, withDeadline } from '../src/utils/deadline.js';

describe('withDeadline', () => {
  it('should resolve with the operation result', async () => {
    await expect(withDeadline(Promise.resolve(42), 1000, 'answer')).resolves.toBe(42);
  });

  it('should propagate the operation rejection', async () => {
    await expect(withDeadline(Promise.reject(new Error('boom')), 1000, 'failing')).rejects.toThrow('boom');
  });

  it('should reject and invoke onTimeout when the deadline passes', async () => {
    const onTimeout = vi.fn();
    const never = new Promise<number>(() => undefined);

    const error = await withDeadline(never, 20, 'slow operation', onTimeout).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(DeadlineExceededError);
    expect(error).toMatchObject({
      operation: 'slow operation',
      timeoutMs: 20,
      code: 'DEADLINE_EXCEEDED',
      message: 'slow operation exceeded its deadline of 20ms',
    });
    expect(onTimeout).toHaveBeenCalledTimes(1);
  });

  it('should not invoke onTimeout after the operation settles', async () => {
    const onTimeout = vi.fn();
    await withDeadline(Promise.resolve('done'), 10, 'fast', onTimeout);
    await new Promise((resolve) => setTimeout(resolve, 30));

    expect(onTimeout).not.toHaveBeenCalled();
  });
});
