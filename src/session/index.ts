export { Session, type SessionOptions, type SessionState } from './session.js';
