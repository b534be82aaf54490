import { describe, it, expect } from 'vitest';
import {
  HookdError,
  RelayNotRunningError,
  TimeoutError,
  WorkerExitedError,
  WorkerUnavailableError,
  InvalidRequestError,
  ConfigError,
  errorMessage,
} from './errors.js';

describe('Error Classes', () => {
  describe('HookdError', () => {
    it('creates error with message', () => {
      const err = new HookdError('test error');
      expect(err.message).toBe('test error');
      expect(err.name).toBe('HookdError');
      expect(err).toBeInstanceOf(Error);
      expect(err).toBeInstanceOf(HookdError);
    });
  });

  describe('RelayNotRunningError', () => {
    it('creates error with default message', () => {
      const err = new RelayNotRunningError();
      expect(err.message).toBe('Relay server is not running. Start with: hookd watchdog start');
      expect(err.name).toBe('RelayNotRunningError');
      expect(err).toBeInstanceOf(HookdError);
    });

    it('creates error with custom message', () => {
      const err = new RelayNotRunningError('Custom msg');
      expect(err.message).toBe('Custom msg');
    });
  });

  describe('TimeoutError', () => {
    it('includes operation and timeout in message', () => {
      const err = new TimeoutError('worker request', 5000);
      expect(err.message).toBe('Timeout after 5000ms: worker request');
      expect(err.name).toBe('TimeoutError');
      expect(err).toBeInstanceOf(HookdError);
    });
  });

  describe('WorkerExitedError', () => {
    it('records exit code and signal', () => {
      const err = new WorkerExitedError(1, null);
      expect(err.code).toBe(1);
      expect(err.signal).toBeNull();
      expect(err.message).toBe('Persistent worker process exited (code=1, signal=null)');
    });
  });

  describe('WorkerUnavailableError', () => {
    it('defaults the reason', () => {
      expect(new WorkerUnavailableError().message).toBe('Persistent worker unavailable: not started');
    });
  });

  describe('InvalidRequestError', () => {
    it('prefixes the detail', () => {
      const err = new InvalidRequestError('args must not be empty');
      expect(err.message).toBe('invalid request: args must not be empty');
      expect(err.name).toBe('InvalidRequestError');
    });
  });

  describe('ConfigError', () => {
    it('prefixes the message', () => {
      expect(new ConfigError('bad').message).toBe('Invalid configuration: bad');
    });
  });

  describe('errorMessage', () => {
    it('unwraps Error instances and stringifies the rest', () => {
      expect(errorMessage(new Error('boom'))).toBe('boom');
      expect(errorMessage('plain')).toBe('plain');
      expect(errorMessage(7)).toBe('7');
    });
  });
});
