#!/usr/bin/env node

import { Command } from "commander";
import { OUTCOME_EXIT_CODES } from "./constants/outcome_codes.js";
import { ConfigError, loadConfig } from "./lib/config.js";
import { runDoctor } from "./lib/doctor.js";
import { atomicWriteJson } from "./lib/fs.js";
import { installInterruptHandlers } from "./lib/interrupt.js";
import type { AtomicOperations } from "./lib/operations.js";
import { createRuntime, type Runtime } from "./lib/runtime.js";
import type { OperationOutcome } from "./types/outcome.js";

interface GlobalOptions {
  config?: string;
  json?: boolean;
  report?: string;
}

const program = new Command();

program
  .name("gitlatch")
  .description("Run git push/pull/checkout/tag/merge under cross-process locks with bounded retries")
  .version("1.0.0")
  .option("-c, --config <path>", "Path to configuration file")
  .option("--json", "Print results as JSON")
  .option("--report <file>", "Write the operation outcome as JSON to <file>");

function globalOptions(): GlobalOptions {
  return program.opts<GlobalOptions>();
}

function printOutcome(outcome: OperationOutcome): void {
  console.log(`${outcome.code}: ${outcome.message}`);
  for (const warning of outcome.warnings) {
    console.log(`  warning: ${warning}`);
  }
  for (const file of outcome.conflicts) {
    console.log(`  conflict: ${file}`);
  }
}

/**
 * Loads config, builds the runtime, and exits 1 on configuration errors.
 */
async function withRuntime(fn: (runtime: Runtime) => Promise<void>): Promise<void> {
  let runtime: Runtime;
  try {
    const config = await loadConfig(globalOptions().config);
    runtime = createRuntime(config);
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(`Configuration error: ${error.message}`);
      process.exit(1);
    }
    throw error;
  }
  await fn(runtime);
}

async function runOperation(
  fn: (operations: AtomicOperations, signal: AbortSignal) => Promise<OperationOutcome>
): Promise<void> {
  await withRuntime(async (runtime) => {
    const controller = new AbortController();
    const dispose = installInterruptHandlers(runtime.locks, controller, { logger: runtime.logger });

    let outcome: OperationOutcome;
    try {
      outcome = await fn(runtime.operations, controller.signal);
    } finally {
      dispose();
    }

    const { json, report } = globalOptions();
    if (json) {
      console.log(JSON.stringify(outcome, null, 2));
    } else {
      printOutcome(outcome);
    }
    if (report) {
      await atomicWriteJson(report, outcome);
    }
    process.exitCode = OUTCOME_EXIT_CODES[outcome.code];
  });
}

program
  .command("push")
  .description("Push a ref under the push lock")
  .argument("[ref]", "Ref to push", "HEAD")
  .option("-r, --remote <name>", "Remote (defaults to git.default_remote)")
  .option("--force-with-lease", "Pass --force-with-lease to git push")
  .action(async (ref: string, options: { remote?: string; forceWithLease?: boolean }) => {
    await runOperation((operations, signal) =>
      operations.push({ ref, remote: options.remote, forceWithLease: options.forceWithLease, signal })
    );
  });

program
  .command("pull")
  .description("Pull a branch under the pull lock")
  .argument("[branch]", "Branch to pull (defaults to the current branch)")
  .option("-r, --remote <name>", "Remote (defaults to git.default_remote)")
  .option("-s, --strategy <strategy>", "merge, rebase or ff-only", "merge")
  .action(async (branch: string | undefined, options: { remote?: string; strategy: string }) => {
    await runOperation((operations, signal) =>
      operations.pull({ branch, remote: options.remote, strategy: options.strategy, signal })
    );
  });

program
  .command("checkout")
  .description("Check out (or create) a branch under the checkout lock")
  .argument("<branch>", "Branch to check out")
  .option("-b, --create", "Create the branch")
  .option("--base <ref>", "Start point for a new branch")
  .action(async (branch: string, options: { create?: boolean; base?: string }) => {
    await runOperation((operations, signal) =>
      operations.checkout({ branch, create: options.create, base: options.base, signal })
    );
  });

program
  .command("tag")
  .description("Create a tag under the tag lock, then push it under the push lock")
  .argument("<name>", "Tag name")
  .option("--commit <ref>", "Commit to tag", "HEAD")
  .option("-m, --message <message>", "Create an annotated tag with this message")
  .option("-r, --remote <name>", "Remote to push the tag to")
  .option("--no-push", "Create the tag without pushing it")
  .action(async (name: string, options: { commit: string; message?: string; remote?: string; push: boolean }) => {
    await runOperation((operations, signal) =>
      operations.tag({
        name,
        commit: options.commit,
        message: options.message,
        remote: options.remote,
        push: options.push,
        signal,
      })
    );
  });

program
  .command("merge")
  .description("Merge a branch under the merge lock")
  .argument("<branch>", "Branch to merge")
  .option("-s, --strategy <strategy>", "Merge strategy", "ort")
  .option("--ff", "Allow fast-forward merges (default is --no-ff)")
  .action(async (branch: string, options: { strategy: string; ff?: boolean }) => {
    await runOperation((operations, signal) =>
      operations.merge({ branch, strategy: options.strategy, noFf: !options.ff, signal })
    );
  });

program
  .command("locks")
  .description("List lock entries and whether their owners are alive")
  .option("--reclaim-stale", "Remove entries whose owner process is dead")
  .action(async (options: { reclaimStale?: boolean }) => {
    await withRuntime(async ({ locks, config }) => {
      const reclaimed = options.reclaimStale ? await locks.reclaimStale() : [];
      const entries = await locks.inspect();

      if (globalOptions().json) {
        console.log(JSON.stringify({ directory: config.lock.directory, locks: entries, reclaimed }, null, 2));
        return;
      }

      for (const record of reclaimed) {
        console.log(`Removed stale lock: ${record.operation} (PID: ${record.owner_pid})`);
      }
      if (entries.length === 0) {
        console.log(`No locks held in ${config.lock.directory}`);
        return;
      }
      for (const entry of entries) {
        const liveness = entry.alive === null ? "unknown" : entry.alive ? "alive" : "dead";
        console.log(`${entry.operation}\tPID ${entry.owner_pid ?? "?"}\t${liveness}\tsince ${entry.acquired_at ?? "?"}`);
      }
    });
  });

program
  .command("status")
  .description("Print a repository summary as JSON")
  .action(async () => {
    await withRuntime(async ({ probe }) => {
      if (!probe.isRepository()) {
        console.error("Not in a git repository");
        process.exitCode = OUTCOME_EXIT_CODES.VALIDATION_FAILED;
        return;
      }
      console.log(JSON.stringify(probe.status(), null, 2));
    });
  });

program
  .command("doctor")
  .description("Diagnose gitlatch configuration and environment")
  .action(async () => {
    const report = await runDoctor({ configPath: globalOptions().config });

    if (globalOptions().json) {
      console.log(JSON.stringify({ checks: report.checks, issues: report.issues }, null, 2));
    } else {
      console.log("gitlatch doctor - checking configuration and environment\n");
      for (const check of report.checks) {
        console.log(`[${check.status}] ${check.message}`);
      }
      console.log("\n--- Summary ---");
      if (report.issues.length === 0) {
        console.log("All checks passed.");
      } else {
        console.log(`Found ${report.issues.length} issue(s)`);
      }
    }

    if (report.checks.some((check) => check.status === "FAIL")) {
      process.exitCode = 1;
    }
  });

export async function main(): Promise<void> {
  await program.parseAsync(process.argv);
}

main().catch((error) => {
  console.error("Fatal error:", error);
  process.exit(1);
});
