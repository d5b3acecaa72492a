export { RecordingBackend } from './recording-backend.js';
export { LoggingBackend } from './logging-backend.js';
