import {
  isToolName,
  parseToolOutput,
  setToolOutput,
  type ToolErrorEntry,
  type ToolErrorMap,
  type ToolName,
  type ToolOutputMap,
} from "../contracts/tool_outputs";
import type { Logger } from "../logger";
import { buildToolArgs, type ToolArgContext } from "./tool_registry";
import { ToolCallError, type ToolInvoker } from "./tool_client";

export type FanOutInput = {
  bundle: readonly string[];
  invoker: ToolInvoker;
  argContext: ToolArgContext;
  userToken?: string;
  maxWorkers: number;
  timeoutMs: number;
  log: Logger;
};

export type FanOutResult = {
  outputs: ToolOutputMap;
  errors: ToolErrorMap;
  invoked: string[];
  reasonCodes: string[];
  timedOut: boolean;
};

/** What one worker produced. Merged into the shared maps only after the join. */
type WorkerSlot = {
  outputs: ToolOutputMap;
  errors: ToolErrorMap;
};

function toErrorEntry(err: unknown): ToolErrorEntry {
  if (err instanceof ToolCallError) return { error_kind: err.kind, message: err.message };
  return {
    error_kind: "transport",
    message: err instanceof Error ? err.message : String(err),
  };
}

async function runOne(
  tool: string,
  input: FanOutInput,
  signal: AbortSignal,
  slot: WorkerSlot
): Promise<void> {
  const { log } = input;
  if (!isToolName(tool)) {
    slot.errors[tool] = { error_kind: "unknown_tool", message: `no such tool: ${tool}` };
    return;
  }
  const started = Date.now();
  try {
    const raw = await input.invoker.call(tool, buildToolArgs(tool, input.argContext), {
      traceId: input.argContext.traceId,
      userToken: input.userToken,
      signal,
    });
    const parsed = parseToolOutput<ToolName>(tool, raw);
    if (parsed.ok) {
      setToolOutput(slot.outputs, tool, parsed.output);
      log.debug({ evt: "tool.ok", tool, ms: Date.now() - started }, "tool.ok");
    } else {
      slot.errors[tool] = { error_kind: "invalid_output", message: parsed.message };
      log.warn({ evt: "tool.invalid_output", tool, message: parsed.message }, "tool.invalid_output");
    }
  } catch (err) {
    const entry = toErrorEntry(err);
    slot.errors[tool] = entry;
    log.warn({ evt: "tool.error", tool, ms: Date.now() - started, ...entry }, "tool.error");
  }
}

/**
 * Dispatch the bundle through a pool of min(maxWorkers, bundle size)
 * workers. A failing tool only fills its own error entry. When the overall
 * timeout fires, calls still in flight are aborted and reported as
 * timeouts; whatever already finished is kept.
 */
export async function fanOutTools(input: FanOutInput): Promise<FanOutResult> {
  const bundle = [...new Set(input.bundle)];
  const invoked = [...bundle];
  if (bundle.length === 0) {
    return { outputs: {}, errors: {}, invoked, reasonCodes: [], timedOut: false };
  }

  const controller = new AbortController();
  const workerCount = Math.max(1, Math.min(input.maxWorkers, bundle.length));
  const slots: WorkerSlot[] = [];
  let next = 0;

  const worker = async (slot: WorkerSlot) => {
    while (!controller.signal.aborted && next < bundle.length) {
      const tool = bundle[next++];
      await runOne(tool, input, controller.signal, slot);
    }
  };

  const workers: Promise<void>[] = [];
  for (let i = 0; i < workerCount; i++) {
    const slot: WorkerSlot = { outputs: {}, errors: {} };
    slots.push(slot);
    workers.push(worker(slot));
  }

  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<"timeout">((resolve) => {
    timer = setTimeout(() => resolve("timeout"), input.timeoutMs);
  });
  const settled = await Promise.race([Promise.all(workers).then(() => "done" as const), timeout]);
  clearTimeout(timer);

  const timedOut = settled === "timeout";
  if (timedOut) controller.abort(new Error("fan-out timed out"));

  // Join. After a timeout, late writes land in the slots and are ignored.
  const outputs: ToolOutputMap = {};
  const errors: ToolErrorMap = {};
  for (const slot of slots) {
    Object.assign(outputs, slot.outputs);
    Object.assign(errors, slot.errors);
  }
  if (timedOut) {
    for (const tool of bundle) {
      if (tool in outputs || tool in errors) continue;
      errors[tool] = { error_kind: "timeout", message: `no result within ${input.timeoutMs}ms` };
    }
  }

  const reasonCodes = bundle.filter((tool) => errors[tool]).map((tool) => `tool_error:${tool}`);
  if (timedOut) reasonCodes.push("fanout_timeout");

  input.log.info(
    {
      evt: "fanout.done",
      workers: workerCount,
      ok: Object.keys(outputs).length,
      failed: Object.keys(errors).length,
      timedOut,
    },
    "fanout.done"
  );
  return { outputs, errors, invoked, reasonCodes, timedOut };
}
