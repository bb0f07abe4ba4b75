/**
 * TRADING MODULE — Index
 */

// Types
export * from './contracts/trading.types.js';

// Services
export { TradingService } from './services/trading.service.js';
export type { TradingServiceConfig } from './services/trading.service.js';

// Routes
export { registerTradingRoutes } from './routes/trading.routes.js';
export type { TradingRoutesDeps } from './routes/trading.routes.js';
