import type { Router } from 'express';

/** A group of routes mounted at the application root */
export interface Controller {
  readonly router: Router;
}
