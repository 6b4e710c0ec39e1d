/**
 * Plant-scoped routing. Every route registered here runs the plant context
 * middleware first; paths with no route never reach it.
 */

import { Router, type RequestHandler } from 'express';

export class PlantRouter {
  private readonly router: Router = Router();

  constructor(private readonly context: RequestHandler) {}

  /**
   * Underlying Express router, mounted once by PlantGateExpress.
   */
  get handler(): Router {
    return this.router;
  }

  get(path: string, ...handlers: RequestHandler[]): this {
    this.router.get(path, this.context, ...handlers);
    return this;
  }

  post(path: string, ...handlers: RequestHandler[]): this {
    this.router.post(path, this.context, ...handlers);
    return this;
  }

  put(path: string, ...handlers: RequestHandler[]): this {
    this.router.put(path, this.context, ...handlers);
    return this;
  }

  patch(path: string, ...handlers: RequestHandler[]): this {
    this.router.patch(path, this.context, ...handlers);
    return this;
  }

  delete(path: string, ...handlers: RequestHandler[]): this {
    this.router.delete(path, this.context, ...handlers);
    return this;
  }
}
