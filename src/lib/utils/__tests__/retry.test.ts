import { AxiosError } from 'axios';
import { isConnectionError, isTimeoutError, withRetry } from '../retry';

describe('withRetry', () => {
  test('should return the first successful result', async () => {
    const fn = jest.fn().mockResolvedValue('ok');
    await expect(withRetry(fn, { initialDelay: 0 })).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  test('should retry up to maxAttempts and rethrow the last error', async () => {
    const fn = jest.fn().mockRejectedValue(new Error('still failing'));
    const onRetry = jest.fn();

    await expect(withRetry(fn, { maxAttempts: 3, initialDelay: 0, onRetry })).rejects.toThrow(
      'still failing'
    );
    expect(fn).toHaveBeenCalledTimes(3);
    expect(onRetry).toHaveBeenCalledTimes(2);
  });

  test('should not retry errors the predicate rejects', async () => {
    const fn = jest.fn().mockRejectedValue(new Error('fatal'));

    await expect(
      withRetry(fn, { maxAttempts: 5, initialDelay: 0, shouldRetry: () => false })
    ).rejects.toThrow('fatal');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  test('should treat maxAttempts below one as a single attempt', async () => {
    const fn = jest.fn().mockRejectedValue(new Error('once'));
    await expect(withRetry(fn, { maxAttempts: 0, initialDelay: 0 })).rejects.toThrow('once');
    expect(fn).toHaveBeenCalledTimes(1);
  });
});

describe('error classification', () => {
  test('should recognise axios timeouts', () => {
    expect(isTimeoutError(new AxiosError('timeout of 5000ms exceeded', 'ECONNABORTED'))).toBe(true);
    expect(isTimeoutError(new AxiosError('connect ETIMEDOUT', 'ETIMEDOUT'))).toBe(true);
    expect(isTimeoutError(new AxiosError('connect ECONNREFUSED', 'ECONNREFUSED'))).toBe(false);
    expect(isTimeoutError(new Error('timeout'))).toBe(false);
  });

  test('should recognise connection failures', () => {
    expect(isConnectionError(new AxiosError('connect ECONNREFUSED', 'ECONNREFUSED'))).toBe(true);
    expect(isConnectionError(new AxiosError('socket hang up', 'ECONNRESET'))).toBe(true);
    expect(isConnectionError(new AxiosError('timeout of 5000ms exceeded', 'ECONNABORTED'))).toBe(
      false
    );
    expect(isConnectionError('ECONNREFUSED')).toBe(false);
  });
});
