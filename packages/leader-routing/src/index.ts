/**
 * @leader-geo/leader-routing
 *
 * Query side of the leader geo map: binary lookup, process-wide map state
 * and the routing decision.
 *
 * @module leader-routing
 */

export { lookupGeoBucket, lookupLeaderGeo } from './lookup.js';
export { route, UNKNOWN_GEO } from './route.js';
export type { RouteResult } from './route.js';
export {
  loadGeoMap,
  setGeoMap,
  getGeoMap,
  geoMapSource,
  resetGeoMap,
} from './geo-map-store.js';
export {
  CONTACT_PREFERENCE,
  extractIpFromSocket,
  preferredAddress,
} from './contact-info.js';
export type { ContactInfo } from './contact-info.js';
export { leaderForSlot, scheduledLeaders } from './leader-schedule.js';
export type { LeaderSchedule } from './leader-schedule.js';
export { LeaderRoutingProcedure } from './procedure.js';
export type { LeaderRpc, LeaderRoutingOutput } from './procedure.js';
export { ProcedureError, ERROR_CODE_INTERNAL } from './errors.js';
export type { ProcedureStage } from './errors.js';
