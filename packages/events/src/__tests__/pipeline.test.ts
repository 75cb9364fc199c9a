import { ok } from 'neverthrow';
import { describe, expect, it } from 'vitest';

import { composePipeline, type EventMiddleware } from '../middleware/pipeline.js';

import { contextFor, orderPlaced } from './fixtures.js';

function tagging(name: string, calls: string[]): EventMiddleware {
  return {
    name,
    process: async (context, next) => {
      calls.push(`${name}:before`);
      const result = await next(context);
      calls.push(`${name}:after`);
      return result;
    },
  };
}

describe('composePipeline', () => {
  it('makes the first middleware the outermost', async () => {
    const calls: string[] = [];
    const pipeline = composePipeline([tagging('outer', calls), tagging('inner', calls)], () => {
      calls.push('handler');
      return Promise.resolve(ok(undefined));
    });

    await pipeline(contextFor(orderPlaced()));

    expect(calls).toEqual(['outer:before', 'inner:before', 'handler', 'inner:after', 'outer:after']);
  });

  it('calls the terminal directly when there is no middleware', async () => {
    const pipeline = composePipeline([], () => Promise.resolve(ok('direct')));

    expect((await pipeline(contextFor(orderPlaced())))._unsafeUnwrap()).toBe('direct');
  });

  it('lets a middleware short-circuit and rewrite the context', async () => {
    const seen: string[] = [];
    const rename: EventMiddleware = {
      name: 'rename',
      process: (context, next) => next({ ...context, handlerName: 'renamed' }),
    };
    const stop: EventMiddleware = {
      name: 'stop',
      process: (context) => {
        seen.push(context.handlerName);
        return Promise.resolve(ok('stopped'));
      },
    };
    const pipeline = composePipeline([rename, stop], () => {
      seen.push('terminal');
      return Promise.resolve(ok(undefined));
    });

    const result = await pipeline(contextFor(orderPlaced()));

    expect(result._unsafeUnwrap()).toBe('stopped');
    expect(seen).toEqual(['renamed']);
  });
});
