import type { SwitchyardLogger, SwitchyardSpan, SwitchyardTracer } from "@switchyard/types";

const NOOP_SPAN: SwitchyardSpan = {
  setAttributes() {},
  recordError() {},
};

/** Runs every callback without recording anything. */
export const NOOP_TRACER: SwitchyardTracer = {
  async withSpan(_name, fn) {
    return fn(NOOP_SPAN);
  },
};

/** Discards every record; handed out outside a dispatch pass. */
export const SILENT_LOGGER: SwitchyardLogger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
  child: () => SILENT_LOGGER,
  withContext: () => SILENT_LOGGER,
};
