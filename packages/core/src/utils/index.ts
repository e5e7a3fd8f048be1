export { PRICE_DECIMALS, PRICE_SCALE, mulDiv, rescale, sumAmounts } from './fixed-point.js';
export { formatAmount } from './format-amount.js';
export {
  type Address,
  type Hex,
  ZERO_ADDRESS,
  isAddress,
  isZeroAddress,
  sameAddress,
  addressKey,
} from './address.js';
