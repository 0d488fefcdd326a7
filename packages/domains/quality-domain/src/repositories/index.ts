export type { DimensionPair, PnrRepository } from './pnr-repository.js';
