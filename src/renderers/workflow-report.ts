import type { ExpireResult, LedgerEntry, PublishResult } from "../ledger/types.js";
import type { PhaseName } from "../lifecycle/types.js";
import type { FleetResult } from "../orchestrator/fleet.js";
import type { ComponentReport, WorkflowResult } from "../orchestrator/orchestrator.js";
import type { TargetsFile } from "../schemas/target.js";
import type { IscsiBootResult } from "../workflows/iscsi-boot.js";

const PHASE_ORDER: readonly PhaseName[] = ["discover", "process", "housekeep"];

/**
 * Renders a workflow result as plain text for the terminal.
 *
 * One line per component with each phase's outcome, then the warnings,
 * then the overall verdict.
 */
export function renderWorkflowResult(result: WorkflowResult, title = "Workflow"): string {
  const sections: string[] = [];

  const verdict = result.aborted ? "ABORTED" : result.success ? "SUCCESS" : "FAILED";
  sections.push(`${title}: ${verdict}`);
  if (result.abort_reason !== undefined) {
    sections.push(`Aborted: ${result.abort_reason}`);
  }

  const lines = result.order.map((key) => renderComponentLine(result.components[key]));
  if (lines.length > 0) {
    sections.push(["Components:", ...lines].join("\n"));
  }

  if (result.warnings.length > 0) {
    sections.push(renderListSection("Warnings", result.warnings));
  }

  return sections.join("\n\n");
}

function renderComponentLine(report: ComponentReport): string {
  const phases = PHASE_ORDER.flatMap((phase) => {
    const outcome = report.phases[phase];
    if (outcome === undefined) return [];
    return [`${phase}=${outcome.success ? "ok" : outcome.error_kind}`];
  });
  const mark = report.success ? "ok" : report.required ? "FAILED" : "failed (optional)";
  const parts = [`- ${report.key}: ${mark}`];
  if (phases.length > 0) parts.push(`[${phases.join(" ")}]`);
  if (report.skipped !== undefined) parts.push(`skipped: ${report.skipped.reason}`);
  return parts.join(" ");
}

/** One server's provisioning run, with the target it boots from and where the record went. */
export function renderIscsiBootResult(result: IscsiBootResult): string {
  const sections = [renderWorkflowResult(result, `Server ${result.server_id} (${result.hostname})`)];
  const facts: string[] = [];
  if (result.target_iqn !== undefined) facts.push(`Target: ${result.target_iqn}`);
  if (result.deployment_record !== undefined) facts.push(`Deployment record: ${result.deployment_record}`);
  if (facts.length > 0) sections.push(facts.join("\n"));
  return sections.join("\n\n");
}

export function renderFleetResult(fleet: FleetResult): string {
  const lines = fleet.servers.map((s) =>
    "error" in s ? `- ${s.server_id}: ERROR ${s.error}` : `- ${s.server_id}: ${s.success ? "ok" : "FAILED"}`,
  );
  return [`Fleet: ${fleet.success ? "SUCCESS" : "FAILED"}`, ...lines].join("\n");
}

/** Targets file as a table-ish listing; CHAP secrets are never printed. */
export function renderTargets(file: TargetsFile): string {
  if (file.targets.length === 0) return "No targets defined.";
  return file.targets
    .map((t) => {
      const auth = t.auth_method === "CHAP" ? `CHAP (${t.chap_username ?? "?"})` : "None";
      const head = `${t.name}: ${t.iqn} @ ${t.ip}:${t.port} lun ${t.lun} auth ${auth}`;
      return t.description === "" ? head : `${head}\n  ${t.description}`;
    })
    .join("\n");
}

export function renderExpireResult(result: ExpireResult): string {
  const verb = result.dry_run ? "Would delete" : "Deleted";
  const sections = [`${verb} ${result.deleted.length} object(s); kept ${result.kept}.`];
  if (result.deleted.length > 0) {
    sections.push(result.deleted.map((key) => `- ${key}`).join("\n"));
  }
  return sections.join("\n");
}

export function renderLedgerEntries(entries: LedgerEntry[]): string {
  if (entries.length === 0) return "No ledger entries.";
  return entries
    .map((e) => {
      const tag = e.version_tag === undefined ? "" : ` [${e.version_tag}]`;
      return `${e.id} ${e.kind} ${e.visibility} ${e.bucket}/${e.key}${tag}`;
    })
    .join("\n");
}

export function renderPublishResult(result: PublishResult): string {
  return `Published ${result.entry.source_id ?? result.entry.id} to ${result.url} (HTTP ${result.status})`;
}

function renderListSection(title: string, items: string[]): string {
  const bullets = items.map((item) => `- ${item}`).join("\n");
  return `${title}:\n${bullets}`;
}
