export { EventBusLogStream } from './event-bus-log-stream.js';
