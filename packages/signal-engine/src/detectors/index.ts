export { detectTimeframeAlignment } from './alignment.js';
export {
  detectLiquidityGrab,
  type LiquidityGrab,
  type LiquidityGrabOptions,
} from './liquidity-grab.js';
