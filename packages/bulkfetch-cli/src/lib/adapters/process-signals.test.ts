import { describe, it, expect, vi } from "vitest";
import { EventEmitter } from "events";
import { createProcessSignalHandler, INTERRUPTED_EXIT_CODE } from "./process-signals.js";

function createFakeProcess() {
  const emitter = new EventEmitter();
  return {
    emitter,
    on: (signal: NodeJS.Signals, listener: () => void) => emitter.on(signal, listener),
    off: (signal: NodeJS.Signals, listener: () => void) => emitter.off(signal, listener),
    exit: vi.fn((_code: number) => {}),
  };
}

describe("process signal handler", () => {
  it("runs callbacks on the first SIGINT", () => {
    const proc = createFakeProcess();
    const handler = createProcessSignalHandler(proc);
    const callback = vi.fn();

    handler.onInterrupt(callback);
    proc.emitter.emit("SIGINT");

    expect(callback).toHaveBeenCalledTimes(1);
    expect(proc.exit).not.toHaveBeenCalled();
  });

  it("handles SIGTERM the same way", () => {
    const proc = createFakeProcess();
    const handler = createProcessSignalHandler(proc);
    const callback = vi.fn();

    handler.onInterrupt(callback);
    proc.emitter.emit("SIGTERM");

    expect(callback).toHaveBeenCalledTimes(1);
  });

  it("exits with 130 on a second signal", () => {
    const proc = createFakeProcess();
    const handler = createProcessSignalHandler(proc);
    const callback = vi.fn();

    handler.onInterrupt(callback);
    proc.emitter.emit("SIGINT");
    proc.emitter.emit("SIGINT");

    expect(callback).toHaveBeenCalledTimes(1);
    expect(proc.exit).toHaveBeenCalledWith(INTERRUPTED_EXIT_CODE);
  });

  it("registers the process listeners once", () => {
    const proc = createFakeProcess();
    const handler = createProcessSignalHandler(proc);

    handler.onInterrupt(() => {});
    handler.onInterrupt(() => {});

    expect(proc.emitter.listenerCount("SIGINT")).toBe(1);
    expect(proc.emitter.listenerCount("SIGTERM")).toBe(1);
  });

  it("removeAll unregisters the listeners", () => {
    const proc = createFakeProcess();
    const handler = createProcessSignalHandler(proc);
    const callback = vi.fn();

    handler.onInterrupt(callback);
    handler.removeAll();
    proc.emitter.emit("SIGTERM");

    expect(proc.emitter.listenerCount("SIGINT")).toBe(0);
    expect(callback).not.toHaveBeenCalled();
  });
});
