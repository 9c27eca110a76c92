/**
 * Source of the script worker, run with `new Worker(WORKER_SOURCE, { eval: true })`.
 *
 * The worker builds a `node:vm` context with a null-prototype global, so the
 * only names a script can reach are the ECMAScript built-ins of that context
 * plus what `installGlobals` defines. Everything handed to the script is
 * re-created in the context realm first; host objects (and with them the host
 * `Function` constructor) never become reachable.
 *
 * Messages to the host:
 * - `{ type: "log", level, message }`
 * - `{ type: "capability_call", id, name, args }`, answered with
 *   `{ type: "capability_result", id, ok, value | error }`
 * - `{ type: "done", output }` or `{ type: "failed", error: { kind, message, trace? } }`
 */
export const WORKER_SOURCE = String.raw`
"use strict";
const { parentPort, workerData } = require("node:worker_threads");
const vm = require("node:vm");
const util = require("node:util");

const WITHHELD_GLOBALS = new Set([
  "require",
  "process",
  "module",
  "exports",
  "Buffer",
  "fetch",
  "__dirname",
  "__filename",
  "setTimeout",
  "setInterval",
  "setImmediate",
]);

const pendingCalls = new Map();
let nextCallId = 0;
let finished = false;
let realm;

function finish(message) {
  if (finished) return;
  finished = true;
  parentPort.postMessage(message);
}

function describeError(error) {
  try {
    if (error === null || (typeof error !== "object" && typeof error !== "function")) {
      return { kind: "ScriptRuntimeError", message: "Uncaught " + String(error) };
    }
    if (error.code === "ERR_SCRIPT_EXECUTION_TIMEOUT") {
      return { kind: "Timeout", message: "Script execution timed out after " + workerData.timeoutMs + " ms" };
    }
    const name = typeof error.name === "string" ? error.name : "Error";
    const message = typeof error.message === "string" ? error.message : String(error);
    const trace = typeof error.stack === "string" ? error.stack : undefined;
    if (name === "EvalError") {
      return { kind: "SandboxViolation", message: "Code generation from strings is not permitted in scripts", trace };
    }
    if (name === "ReferenceError") {
      const match = /^(\S+) is not defined$/.exec(message);
      if (match && WITHHELD_GLOBALS.has(match[1])) {
        return { kind: "SandboxViolation", message: "Access to \"" + match[1] + "\" is not permitted in scripts", trace };
      }
    }
    return { kind: "ScriptRuntimeError", message: name + ": " + message, trace };
  } catch {
    return { kind: "ScriptRuntimeError", message: "Script failed with an unreadable error" };
  }
}

// Context realm -> plain host data that survives postMessage.
function fromContext(value, seen) {
  if (value === null || value === undefined) return value;
  const type = typeof value;
  if (type === "string" || type === "boolean") return value;
  if (type === "number") return Number.isFinite(value) ? value : null;
  if (type === "bigint") return value.toString();
  if (type !== "object") return undefined;
  if (ArrayBuffer.isView(value)) {
    return Uint8Array.from(new Uint8Array(value.buffer, value.byteOffset, value.byteLength));
  }
  if (seen.has(value)) return "[Circular]";
  seen.add(value);
  try {
    const tag = Object.prototype.toString.call(value);
    if (tag === "[object Date]") {
      const time = Date.prototype.getTime.call(value);
      return Number.isNaN(time) ? null : new Date(time).toISOString();
    }
    if (Array.isArray(value)) {
      const out = [];
      for (let i = 0; i < value.length; i++) out.push(fromContext(value[i], seen));
      return out;
    }
    if (tag === "[object Error]") {
      return { name: String(value.name), message: String(value.message) };
    }
    const out = {};
    for (const key of Object.keys(value)) {
      Object.defineProperty(out, key, {
        value: fromContext(value[key], seen),
        enumerable: true,
        writable: true,
        configurable: true,
      });
    }
    return out;
  } finally {
    seen.delete(value);
  }
}

// Host data -> fresh objects of the context realm.
function toContext(value) {
  if (value === null || value === undefined) return value;
  if (typeof value === "function" || typeof value === "symbol") return undefined;
  if (typeof value !== "object") return value;
  if (value instanceof Date) return value.toISOString();
  if (ArrayBuffer.isView(value)) {
    const bytes = realm.bytes(value.byteLength);
    bytes.set(new Uint8Array(value.buffer, value.byteOffset, value.byteLength));
    return bytes;
  }
  if (Array.isArray(value)) {
    const out = realm.array();
    for (let i = 0; i < value.length; i++) {
      Object.defineProperty(out, i, { value: toContext(value[i]), enumerable: true, writable: true, configurable: true });
    }
    return out;
  }
  const out = realm.object();
  for (const key of Object.keys(value)) {
    Object.defineProperty(out, key, { value: toContext(value[key]), enumerable: true, writable: true, configurable: true });
  }
  return out;
}

function contextError(error) {
  const name = error && typeof error.name === "string" ? error.name : "Error";
  const message = error && typeof error.message === "string" ? error.message : String(error);
  return realm.error(name, message);
}

const bridge = {
  call(name, args) {
    try {
      const payload = fromContext(args, new Set());
      const id = ++nextCallId;
      return new Promise((resolve, reject) => {
        pendingCalls.set(id, {
          resolve: (value) => resolve(toContext(value)),
          reject: (error) => reject(contextError(error)),
        });
        parentPort.postMessage({ type: "capability_call", id, name, args: payload });
      });
    } catch (error) {
      throw contextError(error);
    }
  },
  log(level, args) {
    try {
      parentPort.postMessage({ type: "log", level, message: util.format(...fromContext(args, new Set())) });
    } catch (error) {
      throw contextError(error);
    }
  },
};

// Compiled inside the context: literals and built-ins belong to the context realm.
function createRealm() {
  const ContextError = Error;
  const ContextBytes = Uint8Array;
  return {
    object: () => ({}),
    array: () => [],
    bytes: (length) => new ContextBytes(length),
    error: (name, message) => {
      const error = new ContextError(message);
      error.name = name;
      return error;
    },
  };
}

// Compiled inside the context. The bridge stays in this closure.
function installGlobals(bridge, names, inputData, stats) {
  "use strict";
  const define = (name, value) =>
    Object.defineProperty(globalThis, name, { value, writable: true, configurable: true, enumerable: false });
  for (let i = 0; i < names.length; i++) {
    const name = names[i];
    define(name, async (...args) => bridge.call(name, args));
  }
  const logger = (level) => (...args) => {
    bridge.log(level, args);
  };
  define(
    "console",
    Object.freeze({
      log: logger("log"),
      info: logger("info"),
      warn: logger("warn"),
      error: logger("error"),
      debug: logger("debug"),
    }),
  );
  define("input_data", inputData);
  define("ss", stats);
}

async function main() {
  const { script, input, capabilityNames, statsSource, timeoutMs } = workerData;
  const context = vm.createContext(Object.create(null), {
    name: "script-sandbox",
    codeGeneration: { strings: false, wasm: false },
  });

  realm = vm.runInContext("(" + createRealm.toString() + ")()", context);

  const statsFactory = new vm.Script(
    "(function (module, exports) {\n" + statsSource + "\nreturn module.exports;\n})",
    { filename: "simple-statistics.js" },
  ).runInContext(context);
  const statsModule = realm.object();
  statsModule.exports = realm.object();
  const stats = statsFactory(statsModule, statsModule.exports);

  vm.runInContext("(" + installGlobals.toString() + ")", context)(
    bridge,
    toContext(capabilityNames),
    toContext(input),
    stats,
  );

  const wrapped =
    "(async () => {\n" + script + "\n;return typeof output === \"undefined\" ? undefined : output;\n})()";
  const result = await new vm.Script(wrapped, { filename: "user-script.js", lineOffset: -1 }).runInContext(context, {
    timeout: timeoutMs,
  });

  const output = result === undefined ? {} : fromContext(result, new Set());
  if (
    output !== null &&
    typeof output === "object" &&
    !Array.isArray(output) &&
    !ArrayBuffer.isView(output) &&
    Object.prototype.hasOwnProperty.call(output, "error")
  ) {
    const reported = typeof output.error === "string" ? output.error : JSON.stringify(output.error);
    finish({ type: "failed", error: { kind: "ScriptRuntimeError", message: String(reported) } });
    return;
  }
  finish({ type: "done", output });
}

parentPort.on("message", (message) => {
  if (!message || message.type !== "capability_result") return;
  const call = pendingCalls.get(message.id);
  if (!call) return;
  pendingCalls.delete(message.id);
  if (message.ok) call.resolve(message.value);
  else call.reject(message.error);
});

process.on("unhandledRejection", (reason) => {
  finish({ type: "failed", error: describeError(reason) });
});

main().catch((error) => {
  finish({ type: "failed", error: describeError(error) });
});
`;
