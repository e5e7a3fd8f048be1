export type { IPriceOracle } from './IPriceOracle.js';
export type { IBridgeGateway, SendStableParams } from './IBridgeGateway.js';
export type { IReserveToken } from './IReserveToken.js';
export type { ISyntheticLedger } from './ISyntheticLedger.js';
export type { IRedemptionQueueStore } from './IRedemptionQueueStore.js';
