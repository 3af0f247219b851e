#!/usr/bin/env node
import readline from "node:readline";
import { setTimeout as sleep } from "node:timers/promises";
import { timerState } from "../src/agreements/agreement-timer.js";
import { RateLimitedError } from "../src/errors.js";
import { createGeminiOracle } from "../src/infra/gemini-oracle.js";
import { ScriptedUsageSource } from "../src/infra/scripted-usage-source.js";
import { formatDuration, requireDuration } from "../src/negotiation/duration-parser.js";
import { createTemplateOracle } from "../src/negotiation/template-oracle.js";
import { openMonitor } from "../src/orchestrator/monitor.js";
import type { DialogueOracle } from "../src/orchestrator/ports.js";

type RunOptions = {
  app?: string;
  name?: string;
  used?: string;
  oracle: "template" | "gemini";
  model?: string;
  stateDir?: string;
  replies: string[];
};

function parseArgs(argv: string[]): RunOptions {
  const opts: RunOptions = {
    oracle: "template",
    replies: [],
  };
  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    const value = argv[i + 1];
    if (arg === "--app" && value) {
      opts.app = value;
      i += 1;
      continue;
    }
    if (arg === "--name" && value) {
      opts.name = value;
      i += 1;
      continue;
    }
    if (arg === "--used" && value) {
      opts.used = value;
      i += 1;
      continue;
    }
    if (arg === "--oracle" && (value === "template" || value === "gemini")) {
      opts.oracle = value;
      i += 1;
      continue;
    }
    if (arg === "--model" && value) {
      opts.model = value;
      i += 1;
      continue;
    }
    if (arg === "--state-dir" && value) {
      opts.stateDir = value;
      i += 1;
      continue;
    }
    if (arg === "--reply" && value) {
      opts.replies.push(value);
      i += 1;
      continue;
    }
  }
  return opts;
}

function createOracle(opts: RunOptions): DialogueOracle {
  return opts.oracle === "gemini" ? createGeminiOracle({ model: opts.model }) : createTemplateOracle();
}

async function* replySource(opts: RunOptions): AsyncGenerator<string> {
  if (opts.replies.length > 0) {
    for (const reply of opts.replies) {
      console.log(`> ${reply}`);
      yield reply;
    }
    return;
  }
  const rl = readline.createInterface({ input: process.stdin });
  try {
    for await (const line of rl) {
      if (line.trim()) {
        yield line.trim();
      }
    }
  } finally {
    rl.close();
  }
}

async function main() {
  const opts = parseArgs(process.argv.slice(2));
  if (!opts.app) {
    throw new Error("Missing required --app <app identifier>, e.g. --app com.instagram.android");
  }

  const now = Date.now();
  const usedMs = opts.used ? requireDuration(opts.used) : 0;
  const usage = new ScriptedUsageSource();
  usage.setForeground({ appIdentifier: opts.app, appName: opts.name }, now);
  if (usedMs > 0) {
    usage.record(opts.app, now - usedMs, now);
  }

  const { monitor, stateDir } = await openMonitor({
    stateDir: opts.stateDir,
    usageSource: usage,
    oracle: createOracle(opts),
    presentation: {
      async presentIntervention(presentation) {
        console.log(`[${presentation.action}] ${presentation.message}`);
      },
      async notify(notice) {
        console.log(`[${notice.kind}] ${notice.message}`);
      },
    },
    control: {
      async closeSubject(identifier) {
        console.log(`close requested: ${identifier}`);
        return { ok: true };
      },
    },
  });

  const appName = opts.name ?? opts.app;
  const reason = usedMs > 0 ? `You've been on ${appName} for ${formatDuration(usedMs)}.` : `Checking in on ${appName}.`;
  const started = await monitor.startNegotiation({ appIdentifier: opts.app, appName, reason });
  if (!started.ok) {
    throw started.error;
  }
  const session = started.value;
  console.log(session.history[0]?.text ?? reason);

  for await (const reply of replySource(opts)) {
    let result = await monitor.submitUserReply(session.id, reply);
    if (!result.ok && result.error instanceof RateLimitedError) {
      await sleep(result.error.retryAfterMs);
      result = await monitor.submitUserReply(session.id, reply);
    }
    if (!result.ok) {
      console.error(`${result.error.code}: ${result.error.message}`);
      if (result.error.retryable) {
        continue;
      }
      process.exitCode = 1;
      return;
    }
    console.log(result.value.reply);
    if (!result.value.terminal) {
      continue;
    }
    const agreement = result.value.agreement;
    if (agreement) {
      const timer = timerState(agreement, Date.now());
      console.log(`agreement=${agreement.id}`);
      console.log(`expires_in=${timer.formatted}`);
    } else {
      console.log("agreement=none");
    }
    console.log(`state_dir=${stateDir}`);
    return;
  }
  console.log("negotiation left open");
}

main().catch((error) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exitCode = 1;
});
