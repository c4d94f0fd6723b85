import { Match } from "effect"

export type StepOutcome =
  | { readonly _tag: "Succeeded"; readonly step: string; readonly detail: string }
  | { readonly _tag: "Skipped"; readonly step: string; readonly reason: string }
  | { readonly _tag: "Failed"; readonly step: string; readonly error: string }

export const succeeded = (step: string, detail: string): StepOutcome => ({ _tag: "Succeeded", step, detail })

export const skipped = (step: string, reason: string): StepOutcome => ({ _tag: "Skipped", step, reason })

export const failed = (step: string, error: string): StepOutcome => ({ _tag: "Failed", step, error })

export const isFailed = (outcome: StepOutcome): outcome is Extract<StepOutcome, { readonly _tag: "Failed" }> =>
  outcome._tag === "Failed"

export const renderOutcome = (outcome: StepOutcome): string =>
  Match.value(outcome).pipe(
    Match.when({ _tag: "Succeeded" }, ({ detail, step }) => `[ok] ${step}: ${detail}`),
    Match.when({ _tag: "Skipped" }, ({ reason, step }) => `[skip] ${step}: ${reason}`),
    Match.when({ _tag: "Failed" }, ({ error, step }) => `[fail] ${step}: ${error}`),
    Match.exhaustive
  )

export interface OutcomeSummary {
  readonly succeeded: number
  readonly skipped: number
  readonly failed: number
}

// PURITY: CORE
// INVARIANT: succeeded + skipped + failed = |outcomes|
export const summarizeOutcomes = (outcomes: ReadonlyArray<StepOutcome>): OutcomeSummary =>
  outcomes.reduce<OutcomeSummary>(
    (acc, outcome) =>
      Match.value(outcome).pipe(
        Match.when({ _tag: "Succeeded" }, () => ({ ...acc, succeeded: acc.succeeded + 1 })),
        Match.when({ _tag: "Skipped" }, () => ({ ...acc, skipped: acc.skipped + 1 })),
        Match.when({ _tag: "Failed" }, () => ({ ...acc, failed: acc.failed + 1 })),
        Match.exhaustive
      ),
    { succeeded: 0, skipped: 0, failed: 0 }
  )
