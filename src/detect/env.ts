export namespace Env {
  /** Switch that turns automatic installation off entirely */
  export const DISABLE_VAR = "TOOLREADY_NO_AUTO_INSTALL"

  /**
   * Variables whose presence marks a CI run, mapped to the vendor name used in
   * log lines. Unrecognized CI systems are simply treated as local machines.
   */
  export const CI_VARS: Record<string, string> = {
    GITHUB_ACTIONS: "GitHub Actions",
    GITLAB_CI: "GitLab CI",
    CIRCLECI: "CircleCI",
    TRAVIS: "Travis CI",
    JENKINS_URL: "Jenkins",
    JENKINS_HOME: "Jenkins",
    BUILDKITE: "Buildkite",
    TF_BUILD: "Azure Pipelines",
    TEAMCITY_VERSION: "TeamCity",
    BITBUCKET_BUILD_NUMBER: "Bitbucket Pipelines",
    CODEBUILD_BUILD_ID: "AWS CodeBuild",
    DRONE: "Drone",
    CONTINUOUS_INTEGRATION: "Generic CI",
    CI: "Generic CI",
  }

  const FALSY = new Set(["", "0", "false", "no", "off"])

  export function isAutoInstallDisabled(env: NodeJS.ProcessEnv = process.env): boolean {
    const value = env[DISABLE_VAR]
    if (value === undefined) return false
    return !FALSY.has(value.trim().toLowerCase())
  }

  export function isCI(env: NodeJS.ProcessEnv = process.env): boolean {
    return ciPlatform(env) !== null
  }

  /** Name of the detected CI vendor, or null on a local machine */
  export function ciPlatform(env: NodeJS.ProcessEnv = process.env): string | null {
    for (const [key, platform] of Object.entries(CI_VARS)) {
      if (env[key]) return platform
    }
    return null
  }

  export function summary(env: NodeJS.ProcessEnv = process.env): Record<string, string> {
    const keys = [DISABLE_VAR, "TOOLREADY_CONFIG", "TOOLREADY_LOG_LEVEL", "PATH", ...Object.keys(CI_VARS)]

    const result: Record<string, string> = {}
    for (const key of keys) {
      const val = env[key]
      if (val) result[key] = val
    }
    return result
  }
}
