/**
 * @reservemint/core/testing - in-process collaborators and shared contract suites.
 *
 * Usage: import { InMemoryReserveToken, redemptionQueueStoreContractTests } from '@reservemint/core/testing';
 */
export { testAddress } from './accounts.js';
export { InMemoryReserveToken } from './in-memory-reserve-token.js';
export { MockBridgeGateway } from './mock-bridge-gateway.js';
export { FixedPriceOracle } from './fixed-price-oracle.js';
export { redemptionQueueStoreContractTests } from './queue-store-contract.js';
