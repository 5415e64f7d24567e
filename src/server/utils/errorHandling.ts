/**
 * Error handling utilities for route handlers
 */

import { Request, Response, NextFunction } from 'express';

/**
 * Wraps a route handler (sync or async) so thrown errors and rejected promises
 * reach the Express error middleware
 *
 * Usage:
 * ```typescript
 * router.post('/', asyncHandler(async (req, res) => {
 *   res.json(service.run(req.body));
 * }));
 * ```
 */
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => unknown
) {
  return (req: Request, res: Response, next: NextFunction): void => {
    Promise.resolve()
      .then(() => fn(req, res, next))
      .catch(next);
  };
}
