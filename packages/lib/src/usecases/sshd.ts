import type * as CommandExecutor from "@effect/platform/CommandExecutor"
import type { PlatformError } from "@effect/platform/Error"
import { Effect } from "effect"

import type { BoxConfig } from "../core/domain.js"
import { runCommandWithExitCodes } from "../shell/command-runner.js"
import { SshdExitError } from "../shell/errors.js"

// CHANGE: hand the container's foreground over to sshd
// PURITY: SHELL
// EFFECT: Effect<void, SshdExitError | PlatformError, CommandExecutor>
// INVARIANT: stdio is inherited; interrupting the fiber kills the child
// COMPLEXITY: O(lifetime of sshd)
export const runSshd = (
  config: BoxConfig
): Effect.Effect<void, SshdExitError | PlatformError, CommandExecutor.CommandExecutor> =>
  Effect.gen(function*(_) {
    yield* _(Effect.log(`Starting sshd on ${config.bindHost} (${config.sshdPath} -D)`))
    yield* _(
      runCommandWithExitCodes(
        {
          command: config.sshdPath,
          args: ["-D"],
          env: { HOST: config.bindHost, HOSTNAME: config.bindHostname }
        },
        [0],
        (exitCode) => new SshdExitError({ sshdPath: config.sshdPath, exitCode })
      )
    )
  })
