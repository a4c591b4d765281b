import type { Request, RequestHandler } from 'express';

type JsonRequestHandler = (req: Request) => Promise<unknown>;

/**
 * Read-only route: whatever `fn` resolves to is sent as the JSON body. A throw
 * or rejection is passed on to the error handler.
 */
export function jsonHandler(fn: JsonRequestHandler): RequestHandler {
  return (req, res, next) => {
    Promise.resolve()
      .then(() => fn(req))
      .then((body) => {
        res.json(body);
      })
      .catch(next);
  };
}
