export { parseTypeBody, parseListQuery } from './event-schema.js';
export { startEvent, finishEvent, listEvents } from './event-lifecycle.js';
