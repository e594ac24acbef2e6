import { vi } from "vitest";
import { setLogSink } from "@kernloom/utils";

export interface LogSinkLike {
  debug: ReturnType<typeof vi.fn>;
  info: ReturnType<typeof vi.fn>;
  warn: ReturnType<typeof vi.fn>;
  error: ReturnType<typeof vi.fn>;
}

/**
 * Route every Logger into mocks; undo with setLogSink()
 */
export function captureLogs(): LogSinkLike {
  const sink: LogSinkLike = {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
  setLogSink(sink);
  return sink;
}
