// This module bounds handler execution time outside the dispatcher, which imposes no timeout of its own.

import type { ZodTypeAny } from 'zod';
import { HandlerTimeoutError } from '../utils/errors.js';
import type { MethodDescriptor } from './registry.js';

// This helper returns a descriptor whose handler is aborted and rejected with HandlerTimeoutError after timeoutMs.
export function withHandlerTimeout<TSchema extends ZodTypeAny>(
  descriptor: MethodDescriptor<TSchema>,
  timeoutMs: number
): MethodDescriptor<TSchema> {
  if (timeoutMs <= 0) {
    return descriptor;
  }

  return {
    ...descriptor,
    handler: async (args, context) => {
      const controller = new AbortController();
      const forwardAbort = (): void => {
        controller.abort(context.signal.reason);
      };
      let timer: NodeJS.Timeout | undefined;

      if (context.signal.aborted) {
        controller.abort(context.signal.reason);
      } else {
        context.signal.addEventListener('abort', forwardAbort, { once: true });
      }

      const deadline = new Promise<never>((_resolve, reject) => {
        timer = setTimeout(() => {
          const error = new HandlerTimeoutError(descriptor.name, timeoutMs);
          // Reject first so the deadline settles the race before the aborted handler does.
          reject(error);
          controller.abort(error);
        }, timeoutMs);
      });

      try {
        return await Promise.race([
          Promise.resolve().then(() => descriptor.handler(args, { ...context, signal: controller.signal })),
          deadline
        ]);
      } finally {
        clearTimeout(timer);
        context.signal.removeEventListener('abort', forwardAbort);
      }
    }
  };
}
