import { describe, it, expect } from "vitest"
import { Env } from "../src/detect/env"

describe("Env.isAutoInstallDisabled", () => {
  it("is false when the switch is absent", () => {
    expect(Env.isAutoInstallDisabled({})).toBe(false)
  })

  it("is true for any enabling value", () => {
    expect(Env.isAutoInstallDisabled({ TOOLREADY_NO_AUTO_INSTALL: "1" })).toBe(true)
    expect(Env.isAutoInstallDisabled({ TOOLREADY_NO_AUTO_INSTALL: "yes" })).toBe(true)
    expect(Env.isAutoInstallDisabled({ TOOLREADY_NO_AUTO_INSTALL: "TRUE" })).toBe(true)
  })

  it("treats empty and negative values as not set", () => {
    expect(Env.isAutoInstallDisabled({ TOOLREADY_NO_AUTO_INSTALL: "" })).toBe(false)
    expect(Env.isAutoInstallDisabled({ TOOLREADY_NO_AUTO_INSTALL: "0" })).toBe(false)
    expect(Env.isAutoInstallDisabled({ TOOLREADY_NO_AUTO_INSTALL: " false " })).toBe(false)
  })
})

describe("Env.isCI", () => {
  it("is false on a local machine", () => {
    expect(Env.isCI({ HOME: "/home/test", PATH: "/usr/bin" })).toBe(false)
    expect(Env.ciPlatform({})).toBeNull()
  })

  it("recognizes the generic CI flag", () => {
    expect(Env.isCI({ CI: "true" })).toBe(true)
    expect(Env.ciPlatform({ CI: "1" })).toBe("Generic CI")
  })

  it("recognizes vendor flags before the generic one", () => {
    expect(Env.ciPlatform({ CI: "true", GITHUB_ACTIONS: "true" })).toBe("GitHub Actions")
    expect(Env.ciPlatform({ GITLAB_CI: "true" })).toBe("GitLab CI")
    expect(Env.ciPlatform({ JENKINS_URL: "http://jenkins.test" })).toBe("Jenkins")
  })

  it("ignores indicator variables that are present but empty", () => {
    expect(Env.isCI({ CI: "", GITHUB_ACTIONS: "" })).toBe(false)
  })
})

describe("Env.summary", () => {
  it("only reports variables that are set", () => {
    expect(Env.summary({ CI: "true", TOOLREADY_NO_AUTO_INSTALL: "", HOME: "/home/test" })).toEqual({ CI: "true" })
  })
})
