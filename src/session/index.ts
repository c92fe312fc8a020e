export {
  BrowserSession,
  type TeardownReason,
  type SessionOptions,
  type CloseOptions,
  type OpenOverrides,
  type OpenResult,
  type CreateTabResult,
  type CloseTabResult,
  type TabInfo,
  type SessionSummary,
} from './browser-session.js';
export {
  SessionRegistry,
  DEFAULT_SESSION_ID,
  DEFAULT_CAPACITY,
  DEFAULT_IDLE_TIMEOUT_MS,
  type CloseStatus,
  type RegistryOptions,
  type SessionActivity,
} from './session-registry.js';
export {
  IdleReaper,
  DEFAULT_REAP_INTERVAL_MS,
  type IdleReaperOptions,
  type ReapableRegistry,
} from './idle-reaper.js';
