/** Configuration types — layered config system. */
import type { DiagnosticLevel } from "../log/diagnostics.js";
import type { PinMode } from "./source.js";

export type VcspinConfig = {
  schema_version: string;
  manifest: string;
  pin_variable: string;
  source_variable: string;
  shell: string;
  pin_mode: PinMode;
  log_level: DiagnosticLevel;
};
