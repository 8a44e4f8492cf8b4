/**
 * A tool backed by the resource store: what the model is told about it,
 * how its parameters are coerced, and what it does.
 */

import type { z } from 'zod';
import type { Tool } from '../../patterns/types.js';
import type { ResourceStore } from './resource-store.js';

export interface StoreTool<N extends string, S extends z.ZodTypeAny, R> extends Tool {
  name: N;
  input: S;
  run(store: ResourceStore, args: z.output<S>): R;
}
