export { EventSourceClient, extractCursor, MAX_PAGE_SIZE } from './event-source.service.js';
export type { EventOrder, EventPage, EventSource, RawEvent } from './event-source.service.js';
