import * as ec2 from 'aws-cdk-lib/aws-ec2';
import { APP_DIR, BringUpStep } from './steps';

export const RUNNER_PATH = `${APP_DIR}/bring-up.sh`;
export const LOG_FILE = '/var/log/n8n-bring-up.log';
export const STATE_DIR = '/var/lib/n8n-bring-up';
export const LOG_TAG = 'n8n-bring-up';

function functionName(prefix: 'run' | 'verify', stepId: string): string {
  return `${prefix}_${stepId.replace(/-/g, '_')}`;
}

function renderFunction(name: string, body: string[]): string[] {
  // Bodies are not indented: heredoc terminators must start at column 0.
  return [`${name}() {`, ...body, '}', ''];
}

export interface RunnerOptions {
  /** @default LOG_FILE */
  readonly logFile?: string;
  /** @default STATE_DIR */
  readonly stateDir?: string;
}

/**
 * Render the bring-up runner.
 *
 * `bring-up.sh` runs every step in order; `bring-up.sh <step-id>...` runs
 * only the named steps. The first step that fails its run or verify phase
 * stops the run with exit status 1. A `<id>.done` marker is written to
 * the state directory for each step that passes; a re-run removes it first.
 */
export function renderRunner(steps: BringUpStep[], options: RunnerOptions = {}): string {
  const ids = new Set<string>();
  for (const step of steps) {
    if (!/^[a-z][a-z0-9-]*$/.test(step.id)) {
      throw new Error(`Invalid bring-up step id: ${step.id}`);
    }
    if (ids.has(step.id)) {
      throw new Error(`Duplicate bring-up step id: ${step.id}`);
    }
    ids.add(step.id);
  }

  const lines: string[] = [
    '#!/bin/bash',
    `# n8n bring-up. Usage: ${RUNNER_PATH} [step-id ...]`,
    ...steps.map((step) => `#   ${step.id}: ${step.description}`),
    'set -uo pipefail',
    '',
    `LOG_FILE="${options.logFile ?? LOG_FILE}"`,
    `STATE_DIR="${options.stateDir ?? STATE_DIR}"`,
    `STEPS=(${steps.map((step) => step.id).join(' ')})`,
    '',
    'log() {',
    '  echo "$(date -u +%Y-%m-%dT%H:%M:%SZ) $*" >> "$LOG_FILE"',
    '  if command -v logger > /dev/null; then',
    `    logger -t ${LOG_TAG} -- "$*"`,
    '  fi',
    '}',
    '',
  ];

  for (const step of steps) {
    lines.push(...renderFunction(functionName('run', step.id), step.run));
    lines.push(...renderFunction(functionName('verify', step.id), step.verify));
  }

  // run_step is never called from a condition (`if`, `||`, `!`): bash
  // ignores errexit inside a function called there, subshells included.
  lines.push(
    'run_step() {',
    '  local id="$1"',
    '  local fn="${id//-/_}"',
    '  local rc',
    '  if ! declare -F "run_${fn}" > /dev/null; then',
    '    log "unknown step: ${id}"',
    '    return 2',
    '  fi',
    '  rm -f "${STATE_DIR}/${id}.done"',
    '  log "step ${id}: started"',
    '  ( set -e; "run_${fn}" ) >> "$LOG_FILE" 2>&1',
    '  rc=$?',
    '  if [ "$rc" -ne 0 ]; then',
    '    log "step ${id}: failed with exit status ${rc}"',
    '    return 1',
    '  fi',
    '  ( set -e; "verify_${fn}" ) >> "$LOG_FILE" 2>&1',
    '  rc=$?',
    '  if [ "$rc" -ne 0 ]; then',
    '    log "step ${id}: verification failed"',
    '    return 1',
    '  fi',
    '  touch "${STATE_DIR}/${id}.done"',
    '  log "step ${id}: done"',
    '  return 0',
    '}',
    '',
    'mkdir -p "$STATE_DIR"',
    'if [ "$#" -gt 0 ]; then',
    '  SELECTED=("$@")',
    'else',
    '  SELECTED=("${STEPS[@]}")',
    'fi',
    '',
    'for id in "${SELECTED[@]}"; do',
    '  run_step "$id"',
    '  rc=$?',
    '  if [ "$rc" -ne 0 ]; then',
    '    log "bring-up stopped at ${id}; fix the cause and re-run: $0 ${id}"',
    '    exit 1',
    '  fi',
    'done',
    'log "bring-up complete"',
    'exit 0',
  );

  return lines.join('\n');
}

/**
 * Instance user data: write the runner to disk and execute it once.
 * The runner stays on the host so an operator can re-run any step.
 */
export function createBringUpUserData(steps: BringUpStep[]): ec2.UserData {
  const userData = ec2.UserData.forLinux();
  userData.addCommands(
    `mkdir -p ${APP_DIR}`,
    `cat > ${RUNNER_PATH} <<'BRINGUP'`,
    renderRunner(steps),
    'BRINGUP',
    `chmod 750 ${RUNNER_PATH}`,
    RUNNER_PATH,
  );
  return userData;
}
