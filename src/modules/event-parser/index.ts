export { EventParser, TRADE_CLOSED, TRADE_OPEN } from './event-parser.service.js';
export type { ParseFailure } from './event-parser.service.js';
