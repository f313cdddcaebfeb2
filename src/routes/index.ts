export { registerCalculatorRoutes } from './calculator.js';
export { registerRegionRoutes } from './regions.js';
