/**
 * @fileoverview Unit tests for ToolRegistry
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { z } from 'zod';
import { ToolRegistry, defineTool } from './tool-registry.js';
import type { ToolInvokeOptions } from '../execution/executor.js';

const options: ToolInvokeOptions = { timeoutMs: 1_000, signal: new AbortController().signal };

const echoTool = defineTool({
  name: 'echo',
  description: 'Echoes back the input message',
  parameters: { type: 'object', properties: { message: { type: 'string' } }, required: ['message'] },
  input: z.object({ message: z.string() }),
  execute: ({ message }) => message,
});

const sumTool = defineTool({
  name: 'sum',
  description: 'Adds numbers',
  parameters: { type: 'object', properties: { values: { type: 'array', items: { type: 'number' } } } },
  input: z.object({ values: z.array(z.number()) }),
  execute: async ({ values }) => ({ total: values.reduce((a, b) => a + b, 0) }),
});

describe('ToolRegistry', () => {
  let registry: ToolRegistry;

  beforeEach(() => {
    registry = new ToolRegistry();
    registry.register(echoTool).register(sumTool);
  });

  describe('registration', () => {
    it('should reject duplicate names', () => {
      expect(() => registry.register(echoTool)).toThrow("Tool 'echo' is already registered");
    });

    it('should emit registration events', () => {
      const fresh = new ToolRegistry();
      const registered = vi.fn();
      const unregistered = vi.fn();
      fresh.on('tool:registered', registered);
      fresh.on('tool:unregistered', unregistered);

      fresh.register(echoTool);
      fresh.unregister('echo');

      expect(registered).toHaveBeenCalledWith('echo');
      expect(unregistered).toHaveBeenCalledWith('echo');
      expect(fresh.unregister('echo')).toBe(false);
    });

    it('should declare enabled tools only', () => {
      registry.setEnabled('sum', false);

      expect(registry.definitions()).toEqual([
        {
          name: 'echo',
          description: 'Echoes back the input message',
          parameters: { type: 'object', properties: { message: { type: 'string' } }, required: ['message'] },
        },
      ]);
      expect(registry.has('sum')).toBe(false);
    });
  });

  describe('invoke', () => {
    it('should return strings as-is and encode other values', async () => {
      expect(await registry.invoke('echo', '{"message":"hi"}', options)).toEqual({ status: 'Success', output: 'hi' });
      expect(await registry.invoke('sum', '{"values":[1,2,3]}', options)).toEqual({
        status: 'Success',
        output: '{"total":6}',
      });
    });

    it('should fall back to String() for values JSON cannot encode, counting each call once', async () => {
      const completed = vi.fn();
      registry.on('tool:completed', completed);
      const returning = (name: string, value: unknown) =>
        defineTool({
          name,
          description: `Returns a ${name}`,
          parameters: { type: 'object', properties: {} },
          input: z.object({}),
          execute: () => value,
        });
      registry.register(returning('symbol', Symbol('tag'))).register(returning('bigint', BigInt(10)));

      expect(await registry.invoke('symbol', '{}', options)).toEqual({ status: 'Success', output: 'Symbol(tag)' });
      expect(await registry.invoke('bigint', '{}', options)).toEqual({ status: 'Success', output: '10' });
      expect(completed).toHaveBeenCalledTimes(2);
      expect(registry.getMetrics('bigint')).toMatchObject({ invocationCount: 1, failureCount: 0 });
    });

    it('should report unknown tools as not found', async () => {
      expect(await registry.invoke('nope', '{}', options)).toEqual({
        status: 'Failure',
        kind: 'ToolNotFound',
        message: 'Tool "nope" is not registered',
        retriable: false,
      });
    });

    it('should refuse disabled tools', async () => {
      registry.setEnabled('echo', false);

      expect(await registry.invoke('echo', '{"message":"hi"}', options)).toEqual({
        status: 'Failure',
        kind: 'InvocationFailed',
        message: 'Tool "echo" is currently disabled',
        retriable: false,
      });
    });

    it('should reject arguments that are not a JSON object', async () => {
      const outcome = await registry.invoke('echo', '"hi"', options);

      expect(outcome).toMatchObject({ status: 'Failure', message: 'Arguments for "echo" are not a JSON object' });
    });

    it('should validate arguments with the input schema', async () => {
      const outcome = await registry.invoke('echo', '{"message":42}', options);

      expect(outcome).toEqual({
        status: 'Failure',
        kind: 'InvocationFailed',
        message: 'Input validation failed: message: Expected string, received number',
        retriable: false,
      });
    });

    it('should turn thrown errors into failures and track metrics', async () => {
      const failed = vi.fn();
      registry.on('tool:failed', failed);
      registry.register(
        defineTool({
          name: 'explode',
          description: 'Always throws',
          parameters: { type: 'object', properties: {} },
          input: z.object({}),
          retriable: false,
          execute: () => {
            throw new Error('kaboom');
          },
        }),
      );

      const outcome = await registry.invoke('explode', '{}', options);

      expect(outcome).toEqual({ status: 'Failure', kind: 'InvocationFailed', message: 'kaboom', retriable: false });
      expect(failed).toHaveBeenCalledWith('explode', expect.any(String), 'kaboom');
      expect(registry.getMetrics('explode')).toMatchObject({ invocationCount: 1, failureCount: 1 });
    });

    it('should pass the call signal to the tool', async () => {
      const seen: AbortSignal[] = [];
      registry.register(
        defineTool({
          name: 'watch',
          description: 'Records its signal',
          parameters: { type: 'object', properties: {} },
          input: z.object({}),
          execute: (_input, context) => {
            seen.push(context.signal);
            return 'ok';
          },
        }),
      );

      await registry.invoke('watch', '{}', options);

      expect(seen).toEqual([options.signal]);
      expect(registry.getMetrics('watch')?.invocationCount).toBe(1);
    });
  });
});
