#!/usr/bin/env node

import { NodeContext, NodeRuntime } from "@effect/platform-node"
import { Effect } from "effect"

import { program } from "./program.js"

// CHANGE: run the sshbox CLI through the Node runtime
// PURITY: SHELL
// EFFECT: Effect<void, never, NodeContext>
// INVARIANT: program runs with NodeContext.layer; SIGINT/SIGTERM interrupt sshd
// COMPLEXITY: O(n)
const main = Effect.provide(program, NodeContext.layer)

NodeRuntime.runMain(main)
