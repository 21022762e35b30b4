export { SessionStore, sessionSchema, type RetentionPolicy, type StoredSessionInfo } from './session-store.js';
export {
  getSessionsDir,
  getSessionPath,
  getSessionArtifactsDir,
  getFinalCodePath,
  getPatchDiffPath,
} from './paths.js';
export { readJson, writeJson, readText, writeText } from './json.js';
