import type { LogConfig } from './config.js';
import type { IdentityResolver } from './identity.js';
import type { RedactionPolicy } from './redaction.js';

/** Read-only state shared by every serializer; built once by the engine. */
export interface SerializerContext {
  readonly config: Readonly<LogConfig>;
  readonly redaction: RedactionPolicy;
  readonly identity: IdentityResolver;
}
