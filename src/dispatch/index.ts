export { RouteTable, type RouteBinding, type RouteMatch } from './route-table.js';
export { parseRoutePattern, matchRoute, splitPath, type RoutePattern } from './route-pattern.js';
export { bindEndpoints } from './binder.js';
export {
  RequestDispatcher,
  decodeBody,
  parseVersionedPath,
  buildResponse,
  type DispatchRequest,
  type DispatchResponse,
  type DispatcherOptions,
} from './dispatcher.js';
