/**
 * Call-site capture for log entries
 */

import { fileURLToPath } from "node:url";

/** Result of a call-site lookup */
export interface CapturedCallSite {
  function: string;
  file: string;
  line: number;
  ok: boolean;
}

/** Pluggable stack inspection */
export interface CallSiteProvider {
  /**
   * Look up a caller frame
   * @param skipFrames - Frames to skip; 0 is the function that called capture()
   */
  capture(skipFrames: number): CapturedCallSite;
}

/** Strip a path-like prefix up to and including the last "/" */
export function trimFunctionName(name: string): string {
  const idx = name.lastIndexOf("/");
  return idx === -1 ? name : name.slice(idx + 1);
}

/** Report file:// URLs (ESM modules) as plain paths */
function toFilePath(fileName: string): string {
  if (!fileName.startsWith("file://")) {
    return fileName;
  }
  return fileURLToPath(fileName);
}

/** Qualified name of a frame, e.g. "OrderService.place" */
function frameName(frame: NodeJS.CallSite): string {
  const fn = frame.getFunctionName();
  const type = frame.isToplevel() ? null : frame.getTypeName();
  if (fn && type) {
    return `${type}.${fn}`;
  }
  return fn ?? frame.getMethodName() ?? "<anonymous>";
}

/**
 * Read the caller from V8's structured stack frames.
 * Error.prepareStackTrace is swapped out while reading, so source-map hooks
 * installed by the host do not apply: `line` is the line in the executed
 * JavaScript, which differs from the .ts line when the code was compiled.
 */
export class StackCallSiteProvider implements CallSiteProvider {
  capture(skipFrames: number): CapturedCallSite {
    const frames = structuredStack(this.capture);
    const frame = frames[skipFrames];
    if (!frame) {
      return { function: "", file: "", line: 0, ok: false };
    }

    const fileName = frame.getFileName();
    if (!fileName) {
      return { function: "", file: "", line: 0, ok: false };
    }

    return {
      function: trimFunctionName(frameName(frame)),
      file: toFilePath(fileName),
      line: frame.getLineNumber() ?? 0,
      ok: true,
    };
  }
}

/** Collect the frames above `below` without formatting a stack string */
function structuredStack(below: (...args: never[]) => unknown): NodeJS.CallSite[] {
  let frames: NodeJS.CallSite[] = [];
  const original = Error.prepareStackTrace;
  const limit = Error.stackTraceLimit;
  Error.stackTraceLimit = 32;
  Error.prepareStackTrace = (_err, stack) => {
    frames = stack;
    return "";
  };

  try {
    const holder: { stack?: string } = {};
    Error.captureStackTrace(holder, below);
    // The stack is formatted lazily on first read
    if (holder.stack === undefined) {
      return [];
    }
  } finally {
    Error.prepareStackTrace = original;
    Error.stackTraceLimit = limit;
  }
  return frames;
}

/** Provider returning the same call site every time */
export class FixedCallSiteProvider implements CallSiteProvider {
  private result: CapturedCallSite;
  readonly requests: number[] = [];

  constructor(result: Partial<CapturedCallSite> = {}) {
    this.result = {
      function: result.function ?? "main.handler",
      file: result.file ?? "/srv/app/main.ts",
      line: result.line ?? 1,
      ok: result.ok ?? true,
    };
  }

  capture(skipFrames: number): CapturedCallSite {
    this.requests.push(skipFrames);
    return { ...this.result };
  }
}
