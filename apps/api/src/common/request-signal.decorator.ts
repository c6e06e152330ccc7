import { createParamDecorator, ExecutionContext } from '@nestjs/common';
import type { ServerResponse } from 'node:http';

/**
 * An AbortSignal that fires when the client goes away before the response is
 * written. Handlers pass it down so in-flight cache/store/provider calls stop.
 */
export const RequestSignal = createParamDecorator((_: unknown, ctx: ExecutionContext): AbortSignal => {
  const res = ctx.switchToHttp().getResponse<ServerResponse>();
  const controller = new AbortController();
  res.once('close', () => {
    if (!res.writableFinished) controller.abort(new Error('client closed request'));
  });
  return controller.signal;
});
