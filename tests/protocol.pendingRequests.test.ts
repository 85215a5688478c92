import { RequestTimeoutError, ValidationError } from '../src/protocol/errors.js';
import { PendingRequestTable } from '../src/protocol/pendingRequests.js';

describe('PendingRequestTable', () => {
  afterEach(() => {
    jest.useRealTimers();
  });

  it('resolves a registered request exactly once and removes it', async () => {
    const table = new PendingRequestTable();
    const response = table.register('1', 1000);

    expect(table.has('1')).toBe(true);
    expect(table.resolve('1', { id: '1', status: 'success' })).toBe(true);
    expect(table.resolve('1', { id: '1', status: 'error' })).toBe(false);

    await expect(response).resolves.toEqual({ id: '1', status: 'success' });
    expect(table.size).toBe(0);
  });

  it('times out and clears the entry', async () => {
    jest.useFakeTimers();
    const table = new PendingRequestTable();
    const response = table.register('2', 500);

    jest.advanceTimersByTime(500);

    await expect(response).rejects.toBeInstanceOf(RequestTimeoutError);
    await expect(response).rejects.toMatchObject({ requestId: '2', timeoutMs: 500 });
    expect(table.size).toBe(0);
    expect(table.resolve('2', { id: '2', status: 'success' })).toBe(false);
  });

  it('refuses a duplicate id', async () => {
    const table = new PendingRequestTable();
    const first = table.register('3', 1000);

    await expect(table.register('3', 1000)).rejects.toBeInstanceOf(ValidationError);
    expect(table.size).toBe(1);

    table.resolve('3', { id: '3' });
    await first;
  });

  it('rejects every outstanding entry on teardown', async () => {
    const table = new PendingRequestTable();
    const first = table.register('4', 1000);
    const second = table.register('5', 1000);

    expect(table.rejectAll(new Error('connection closed'))).toBe(2);

    await expect(first).rejects.toThrow('connection closed');
    await expect(second).rejects.toThrow('connection closed');
    expect(table.size).toBe(0);
  });
});
