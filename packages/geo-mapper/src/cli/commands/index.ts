export { runGenerateCommand, defaultGenerateDeps } from './generate.js';
export type { GenerateCommandOptions, GenerateDepsFactory } from './generate.js';
export { runInspectCommand } from './inspect.js';
export { runLookupCommand } from './lookup.js';
export { runRouteCommand, defaultRouteRpc } from './route.js';
export type { RouteCommandOptions, RouteRpcFactory } from './route.js';
