import type { RuntimeConfig } from "../../config/runtime-config.js";
import { resolveRepoPath } from "../../config/runtime-config.js";
import { isoTimestamp, type Clock } from "../../infra/clock.js";
import type { PhoneView } from "../types.js";
import { loadPhoneStatus } from "./payload.js";
import { renderViewMarkdown, viewPayload, writeProjectionBundle, type ProjectionFiles, type ViewPayload } from "./views.js";

export const DEFAULT_PHONE_JSON = "dev/reports/autonomy/queue/phone/latest.json";

export type PhoneStatusOptions = {
  phoneJson: string;
  view: PhoneView;
  emitProjections?: string;
};

export type PhoneStatusReport = {
  command: "phone-status";
  timestamp: string;
  ok: boolean;
  inputPath: string;
  view: PhoneView;
  viewPayload: ViewPayload | null;
  projectionDir: string | null;
  projectionFiles: ProjectionFiles | null;
  warnings: string[];
  errors: string[];
};

export async function runPhoneStatus(
  options: PhoneStatusOptions,
  deps: { config: RuntimeConfig; clock: Clock },
): Promise<{ exitCode: number; report: PhoneStatusReport }> {
  const inputPath = resolveRepoPath(deps.config, options.phoneJson);
  const loaded = await loadPhoneStatus(inputPath);
  const errors = loaded.ok ? [] : [loaded.error];

  let projectionDir: string | null = null;
  let projectionFiles: ProjectionFiles | null = null;
  if (loaded.ok && options.emitProjections?.trim()) {
    projectionDir = resolveRepoPath(deps.config, options.emitProjections.trim());
    projectionFiles = await writeProjectionBundle(projectionDir, loaded.value);
  }

  const report: PhoneStatusReport = {
    command: "phone-status",
    timestamp: isoTimestamp(deps.clock.now()),
    ok: errors.length === 0,
    inputPath,
    view: options.view,
    viewPayload: loaded.ok ? viewPayload(loaded.value, options.view) : null,
    projectionDir,
    projectionFiles,
    warnings: [],
    errors,
  };
  return { exitCode: report.ok ? 0 : 1, report };
}

export function renderPhoneReportMarkdown(report: PhoneStatusReport) {
  const lines = ["# autoloop phone-status", ""];
  lines.push(`- ok: ${report.ok}`);
  lines.push(`- input: ${report.inputPath}`);
  lines.push(`- view: ${report.view}`);
  lines.push(`- timestamp: ${report.timestamp}`);
  if (report.projectionDir) {
    lines.push(`- projection_dir: ${report.projectionDir}`);
  }
  lines.push("");
  if (report.warnings.length > 0) {
    lines.push("## Warnings", "", ...report.warnings.map((row) => `- ${row}`), "");
  }
  if (report.errors.length > 0) {
    lines.push("## Errors", "", ...report.errors.map((row) => `- ${row}`), "");
  }
  if (report.viewPayload) {
    lines.push(renderViewMarkdown(report.viewPayload));
  }
  return lines.join("\n");
}
