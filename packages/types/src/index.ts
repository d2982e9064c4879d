export * as configFile from './config/ControlPlaneConfig.js';

export * from './definitions.js';
export * as api_routes from './routes.js';
