export { runSessions } from './run-sessions.js';
