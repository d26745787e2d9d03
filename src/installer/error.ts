import { z } from "zod"

export const InstallErrorKind = z.enum([
  "PlatformUnsupported",
  "PackageManagerUnavailable",
  "UnknownManager",
  "NoPackage",
  "CommandFailed",
  "Timeout",
  "ExecutionError",
  "SkippedCiPrivilege",
  "VerificationFailed",
  "Cancelled",
  "UnexpectedException",
])
export type InstallErrorKind = z.infer<typeof InstallErrorKind>

/** What a status snapshot carries about a failed or cancelled attempt */
export interface InstallErrorInfo {
  kind: InstallErrorKind
  message: string
}

export class InstallError extends Error {
  kind: InstallErrorKind
  detail?: string

  constructor(kind: InstallErrorKind, detail?: string) {
    super(detail ? `${InstallError.summary(kind)}: ${detail}` : InstallError.summary(kind))
    this.name = "InstallError"
    this.kind = kind
    this.detail = detail
  }

  info(): InstallErrorInfo {
    return { kind: this.kind, message: this.message }
  }

  /** Wrap anything thrown into an InstallError, keeping existing ones as they are */
  static from(err: unknown): InstallError {
    if (err instanceof InstallError) return err
    const detail = err instanceof Error ? err.message : String(err)
    return new InstallError("UnexpectedException", detail || "unknown error")
  }

  static summary(kind: InstallErrorKind): string {
    switch (kind) {
      case "PlatformUnsupported":
        return "Automatic installation is not supported on this platform"
      case "PackageManagerUnavailable":
        return "No supported package manager was found"
      case "UnknownManager":
        return "Unknown package manager"
      case "NoPackage":
        return "No package is known for this package manager"
      case "CommandFailed":
        return "Install command failed"
      case "Timeout":
        return "Install command timed out"
      case "ExecutionError":
        return "Install command could not be run"
      case "SkippedCiPrivilege":
        return "Skipped privileged install in CI"
      case "VerificationFailed":
        return "Installed tool did not pass verification"
      case "Cancelled":
        return "Installation cancelled"
      case "UnexpectedException":
        return "Unexpected error during installation"
    }
  }
}
