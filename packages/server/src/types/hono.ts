import type { Context } from 'hono';
import type { Identity } from './token.js';

/**
 * Hono context variables
 */
export interface AppVariables {
  identity?: Identity;
}

export type AppEnv = { Variables: AppVariables };

export type AppContext = Context<AppEnv>;

