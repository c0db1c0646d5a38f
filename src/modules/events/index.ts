export { EventMirror, InMemoryEventMirror, ConsoleEventMirror } from './event-mirror';
export { HttpEventMirror, CanonicalEvent, toCanonicalEvent } from './http-event-mirror';
