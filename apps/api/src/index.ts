/**
 * @finledger/api
 *
 * tRPC procedures over the ledger. Transport-agnostic: mount appRouter on
 * any tRPC adapter, or call it in-process through createCaller.
 */

import { createCallerFactory } from './lib/trpc';
import { appRouter } from './routes';

export { appRouter, type AppRouter } from './routes';
export { createContext, type Context } from './lib/trpc';
export { config, loadConfig, type AppConfig } from './lib/config';

export const createCaller = createCallerFactory(appRouter);
