import type { FailureEnvelope, ToolEnvelope } from '../patterns/types.js';
import type { CatalogSeed } from '../example/tools/data.js';

/** The two-GPU catalog: H100 ×3 at 20000, A100 ×4 at 11950. */
export function gpuSeed(): CatalogSeed {
  return {
    products: [
      { sku: 'gpu-h100', name: 'Nvidia H100', price: 20000, category: 'gpu', available: 3 },
      { sku: 'gpu-a100', name: 'Nvidia A100', price: 11950, category: 'gpu', available: 4 },
    ],
  };
}

export function payloadOf(envelope: ToolEnvelope): unknown {
  if (!envelope.success) {
    throw new Error(`expected success, got ${envelope.statusCode} ${envelope.error.code}`);
  }
  return envelope.payload;
}

export function failureOf(envelope: ToolEnvelope): FailureEnvelope {
  if (envelope.success) {
    throw new Error('expected a failure envelope');
  }
  return envelope;
}
