/**
 * Entitle Kernel — Output Renderer
 *
 * Serializes results for humans (text) or machines (JSON). Rendering is
 * pure: functions return lines and the CLI decides where they go.
 *
 * JSON output lists keys in schema order with a 2-space indent, so the same
 * result always renders to the same bytes.
 */

import type { ErrorEntry, OperationAction, OperationResult } from '../types/operation.js';
import type { HelpInfo } from '../help/help-query.js';
import type { StatusReport } from '../status/status.js';

export const REBOOT_REQUIRED_MESSAGE = 'A reboot is required to complete the operation.';

/** Lines destined for each output stream. */
export interface RenderedText {
  readonly stdout: ReadonlyArray<string>;
  readonly stderr: ReadonlyArray<string>;
}

// ---------------------------------------------------------------------------
// Operation result
// ---------------------------------------------------------------------------

function orderedEntry(e: ErrorEntry): ErrorEntry {
  return { message: e.message, message_code: e.message_code, service: e.service, type: e.type };
}

export function renderResultJson(result: OperationResult): string {
  const ordered: OperationResult = {
    _schema_version: result._schema_version,
    result: result.result,
    processed_services: result.processed_services,
    failed_services: result.failed_services,
    errors: result.errors.map(orderedEntry),
    warnings: result.warnings.map(orderedEntry),
    needs_reboot: result.needs_reboot,
  };
  return JSON.stringify(ordered, null, 2);
}

const PAST_TENSE: Readonly<Record<OperationAction, string>> = {
  enable: 'enabled',
  disable: 'disabled',
  attach: 'enabled',
  'auto-attach': 'enabled',
  detach: 'disabled',
  refresh: 'disabled',
};

/**
 * Text form: warnings, one line per processed service and the reboot notice
 * on stdout; error messages on stderr.
 */
export function renderResultText(result: OperationResult, action: OperationAction): RenderedText {
  const stdout: string[] = result.warnings.map((w) => w.message);
  for (const name of result.processed_services) {
    stdout.push(`${name} ${PAST_TENSE[action]}`);
  }
  if (result.needs_reboot) {
    stdout.push(REBOOT_REQUIRED_MESSAGE);
  }
  return { stdout, stderr: result.errors.map((e) => e.message) };
}

// ---------------------------------------------------------------------------
// Help
// ---------------------------------------------------------------------------

export function renderHelpJson(info: HelpInfo): string {
  return JSON.stringify({ name: info.name, available: info.available, help: info.help }, null, 2);
}

export function renderHelpText(info: HelpInfo): string {
  return ['Name:', info.name, '', 'Available:', info.available, '', 'Help:', info.help].join('\n');
}

// ---------------------------------------------------------------------------
// Status
// ---------------------------------------------------------------------------

export function renderStatusJson(report: StatusReport): string {
  return JSON.stringify(
    {
      _schema_version: report._schema_version,
      attached: report.attached,
      contract_name: report.contract_name,
      series: report.series,
      services: report.services.map((s) => ({
        name: s.name,
        entitled: s.entitled,
        status: s.status,
        available: s.available,
        description: s.description,
      })),
    },
    null,
    2,
  );
}

/** Column table of services followed by an attachment summary line. */
export function renderStatusText(report: StatusReport): ReadonlyArray<string> {
  const header = {
    name: 'SERVICE',
    entitled: 'ENTITLED',
    status: 'STATUS',
    available: 'AVAILABLE',
    description: 'DESCRIPTION',
  };
  const rows = [header, ...report.services];
  const nameWidth = Math.max(...rows.map((r) => r.name.length));
  const entitledWidth = Math.max(...rows.map((r) => r.entitled.length));
  const statusWidth = Math.max(...rows.map((r) => r.status.length));
  const availableWidth = Math.max(...rows.map((r) => r.available.length));

  const lines = rows.map((r) =>
    [
      r.name.padEnd(nameWidth),
      r.entitled.padEnd(entitledWidth),
      r.status.padEnd(statusWidth),
      r.available.padEnd(availableWidth),
      r.description,
    ].join('  '),
  );
  lines.push('');
  lines.push(
    report.attached
      ? `This machine is attached to '${report.contract_name ?? ''}'.`
      : 'This machine is not attached to an Ubuntu Pro subscription.',
  );
  return lines;
}
