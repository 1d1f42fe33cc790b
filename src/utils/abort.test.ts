import { describe, expect, test } from 'vitest';
import { OperationAbortedError, throwIfAborted, withAbort } from './abort';

describe('withAbort', () => {
  test('runs the operation when no signal is given', async () => {
    await expect(withAbort(async () => 42)).resolves.toBe(42);
  });

  test('resolves with the operation result when the signal stays idle', async () => {
    const controller = new AbortController();
    await expect(withAbort(async () => 'ok', controller.signal)).resolves.toBe('ok');
  });

  test('passes operation errors through', async () => {
    const failure = new Error('boom');
    const controller = new AbortController();

    await expect(
      withAbort(async () => {
        throw failure;
      }, controller.signal)
    ).rejects.toBe(failure);
  });

  test('never starts the operation on an aborted signal', async () => {
    let started = false;
    const controller = new AbortController();
    controller.abort();

    await expect(
      withAbort(async () => {
        started = true;
      }, controller.signal)
    ).rejects.toBeInstanceOf(OperationAbortedError);
    expect(started).toBe(false);
  });
});

describe('throwIfAborted', () => {
  test('keeps the abort reason as the cause', () => {
    const controller = new AbortController();
    controller.abort('caller cancelled');

    try {
      throwIfAborted(controller.signal);
      expect.unreachable('throwIfAborted should throw');
    } catch (error) {
      expect(error).toBeInstanceOf(OperationAbortedError);
      expect((error as OperationAbortedError).cause).toBe('caller cancelled');
    }
  });

  test('does nothing without a signal', () => {
    expect(() => throwIfAborted(undefined)).not.toThrow();
  });
});
