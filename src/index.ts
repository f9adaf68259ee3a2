export { resolve, explain, normalizePath, type Resolution } from './router/pattern-router.js';
export { compilePattern, matchesPattern, unsupportedSyntax } from './router/glob.js';
export {
    ProcessSupervisor,
    buildChildEnv,
    type ChildHandle,
    type ExitStatus,
    type SpawnFunction,
    type SpawnRequest,
    type SupervisorOptions
} from './backend/process-supervisor.js';
export { probeServer, probeTransport, type ProbeReport } from './backend/probe.js';
export { forward, type Forwarding, type ForwardOptions, type LoopResult } from './proxy/stream-forwarder.js';
export { Session, SessionState, ExitCodes, exitCodeFor, type SessionOptions, type SessionResult, type SessionEndReason } from './session/session.js';
export { resolveWorkingDirectory, WORKDIR_ENV_VAR, type WorkingDirectory } from './session/working-directory.js';
export { serve, type ServeOptions } from './frontend/serve.js';
export {
    loadRouterConfig,
    loadRawRouterConfig,
    saveRouterConfig,
    toRouteTable,
    addRoute,
    removeRoute,
    substituteEnvVars
} from './config/route-config.js';
export { resolveConfigPath, getConfigDir, getDefaultConfigPath, CONFIG_ENV_VAR } from './utils/config-paths.js';
export { RouterError, ConfigurationError, SpawnError, StreamError, ChildExitError } from './errors.js';
export type { RouteTable, RouteRule, RouteTarget, ServerSpec, RouterConfig, RouterConfigInput } from './types/config.js';
