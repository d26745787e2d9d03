import { describe, it, expect, vi, afterEach } from "vitest"
import { InstallationState } from "../src/installer/state"
import { Status } from "../src/installer/status"
import { Cancellation } from "../src/installer/cancel"
import { InstallError } from "../src/installer/error"

describe("InstallationState.guard", () => {
  it("releases after an exception", () => {
    const state = new InstallationState()
    expect(() =>
      state.guard(() => {
        throw new Error("boom")
      }),
    ).toThrow("boom")
    expect(state.guard((f) => f.inProgress)).toBe(false)
  })

  it("refuses nested sections", () => {
    const state = new InstallationState()
    expect(() => state.guard(() => state.guard(() => 1))).toThrow("not re-entrant")
  })
})

describe("begin / settle", () => {
  it("resets the previous attempt before entering in-progress", () => {
    const f = InstallationState.initial()
    InstallationState.begin(f, 1_000)
    InstallationState.settle(f, 3_000, new InstallError("Timeout").info())
    f.cancelRequested = true

    InstallationState.begin(f, 10_000)
    expect(f).toEqual({
      inProgress: true,
      outcome: null,
      error: null,
      startedAt: 10_000,
      duration: null,
      cancelRequested: false,
      worker: null,
    })
  })

  it("stores the duration in seconds once", () => {
    const f = InstallationState.initial()
    InstallationState.begin(f, 1_000_000)
    InstallationState.settle(f, 1_002_500, null)
    expect(f.duration).toBe(2.5)
    expect(f.outcome).toBe(true)
    expect(f.inProgress).toBe(false)
  })
})

describe("Status.snapshot", () => {
  it("is all empty before any attempt", () => {
    expect(Status.snapshot(InstallationState.initial(), 5_000)).toEqual({
      inProgress: false,
      outcome: null,
      error: null,
      startedAt: null,
      duration: null,
    })
  })

  it("derives the duration while in progress", () => {
    const f = InstallationState.initial()
    InstallationState.begin(f, 1_000_000)
    const snap = Status.snapshot(f, 1_010_000)
    expect(snap.inProgress).toBe(true)
    expect(snap.duration).toBe(10)
    expect(snap.startedAt).toEqual(new Date(1_000_000))
  })

  it("returns the stored duration after the attempt ended", () => {
    const f = InstallationState.initial()
    InstallationState.begin(f, 1_000_000)
    InstallationState.settle(f, 1_004_000, null)
    expect(Status.snapshot(f, 1_004_000).duration).toBe(4)
    expect(Status.snapshot(f, 9_000_000).duration).toBe(4)
  })

  it("hands out a copy of the error", () => {
    const f = InstallationState.initial()
    InstallationState.begin(f, 0)
    InstallationState.settle(f, 1_000, new InstallError("CommandFailed", "exit 1").info())
    const snap = Status.snapshot(f, 1_000)
    expect(snap.error).toEqual({ kind: "CommandFailed", message: "Install command failed: exit 1" })
    expect(snap.error).not.toBe(f.error)
  })
})

describe("Status.describe", () => {
  it("renders each state", () => {
    const base: Status.Snapshot = { inProgress: false, outcome: null, error: null, startedAt: null, duration: null }
    expect(Status.describe(base)).toBe("not attempted")
    expect(Status.describe({ ...base, inProgress: true, duration: 3 })).toBe("installing (3.0s)")
    expect(Status.describe({ ...base, outcome: true, duration: 12.25 })).toBe("installed (12.3s)")
    expect(
      Status.describe({ ...base, outcome: false, duration: 1, error: { kind: "Cancelled", message: "Installation cancelled" } }),
    ).toBe("cancelled (1.0s)")
    expect(
      Status.describe({ ...base, outcome: false, duration: 2, error: { kind: "Timeout", message: "Install command timed out" } }),
    ).toBe("failed (2.0s): Install command timed out")
  })
})

describe("Cancellation.request", () => {
  it("has nothing to cancel when no attempt runs", () => {
    const f = InstallationState.initial()
    expect(Cancellation.request(f)).toBe(false)
    expect(f.cancelRequested).toBe(false)
  })

  it("can't cancel a foreground attempt", () => {
    const f = InstallationState.initial()
    InstallationState.begin(f, 0)
    expect(Cancellation.request(f)).toBe(false)
    expect(f.cancelRequested).toBe(false)
  })

  it("flags a background attempt, repeatedly", () => {
    const f = InstallationState.initial()
    InstallationState.begin(f, 0)
    f.worker = Promise.resolve()
    expect(Cancellation.request(f)).toBe(true)
    expect(Cancellation.request(f)).toBe(true)
    expect(f.cancelRequested).toBe(true)
  })
})

describe("InstallationState.steadyClock", () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  it("starts at the wall-clock time", () => {
    const wall = Date.now()
    const clock = InstallationState.steadyClock()
    expect(Math.abs(clock() - wall)).toBeLessThan(1_000)
  })

  it("does not run backwards when the wall clock is set back", () => {
    const clock = InstallationState.steadyClock()
    const before = clock()
    vi.spyOn(Date, "now").mockReturnValue(0)
    expect(clock()).toBeGreaterThanOrEqual(before)
  })
})
