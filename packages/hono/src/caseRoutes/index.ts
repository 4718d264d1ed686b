// route exports
export { healthRouteHandler } from './routes/health.route.js';
export { processDetailsRouteHandler } from './routes/processDetails.route.js';
export { processNumberRouteHandler } from './routes/processNumber.route.js';
