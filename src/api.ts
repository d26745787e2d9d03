export { Env } from "./detect/env"
export { OS } from "./detect/os"
export { Shell } from "./executor/shell"
export { PackageManager } from "./executor/manager"
export { InstallError, InstallErrorKind } from "./installer/error"
export type { InstallErrorInfo } from "./installer/error"
export { InstallationState } from "./installer/state"
export { Status } from "./installer/status"
export { Cancellation } from "./installer/cancel"
export { Verifier } from "./installer/verifier"
export { Orchestrator } from "./installer/orchestrator"
export { Tool } from "./tool/tool"
export { Registry, ready } from "./tool/registry"
export { ToolProvider } from "./tool/provider"
export { Config } from "./config/config"
export { ToolreadyConfig, InstallConfig } from "./config/schema"
export { Log } from "./util/log"
