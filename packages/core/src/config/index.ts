/**
 * Config Module - Configuration Management
 */

export { ConfigManager } from "./manager.js";
export type { ShellFleetConfig, SSHSettings, ClusterSettings, LoggingSettings } from "./types.js";
export { HostVerificationMode, ReconnectPolicy, DEFAULT_CONFIG } from "./types.js";
