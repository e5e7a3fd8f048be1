// @reservemint/adapter-evm
export { ChainlinkPriceOracle, type ChainlinkPriceOracleOptions } from './chainlink-price-oracle.js';
export { AGGREGATOR_V3_ABI } from './abi/aggregator-v3.js';
