// src/lib/error-messages.ts
export const ERR_MSG = {
  BAD_INPUT_SCHEMA: "Request validation failed",
  BAD_QUERY_PARAMS: "Invalid query parameters",
  ASSET_NOT_FOUND: "Asset not found",
  JOB_NOT_FOUND: "Job not found",
  JOB_NOT_READY: "Job is not complete. Current status: {status}",
  OUTPUT_MISSING: "Output file not found",
  INSUFFICIENT_SAMPLES: "Not enough background samples ({count} of {min} needed)",
  ENCODER_UNAVAILABLE: "ffmpeg or ffprobe not found. Install ffmpeg and ensure it is in PATH.",
  ENCODER_EXIT: "Encoder exited with code {code}",
  ENCODER_SIGNAL: "Encoder terminated by signal {signal}",
  INTERNAL_UNEXPECTED: "Something went wrong",
} as const;

export type ErrKey = keyof typeof ERR_MSG;

export function msg(key: ErrKey): string {
  return ERR_MSG[key];
}

// Fills {name} placeholders
export function fmt(key: ErrKey, vars: Record<string, string | number> = {}): string {
  let s: string = ERR_MSG[key];
  for (const [k, v] of Object.entries(vars)) s = s.replace(new RegExp(`{${k}}` , "g"), String(v));
  return s;
}
