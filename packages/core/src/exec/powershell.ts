import { z } from 'zod';
import { firstLine } from '@hostpulse/shared';
import type { HostShell } from './HostShell.js';

const POWERSHELL_EXECUTABLES = ['pwsh', 'powershell.exe', 'powershell'];

export async function findPowerShell(shell: HostShell): Promise<string | null> {
  for (const executable of POWERSHELL_EXECUTABLES) {
    if (await shell.hasCommand(executable)) return executable;
  }
  return null;
}

/**
 * Run a PowerShell script and return its stdout, or null when no PowerShell
 * is available or the script exits non-zero.
 */
export async function runPowerShell(shell: HostShell, script: string): Promise<string | null> {
  const executable = await findPowerShell(shell);
  if (!executable) return null;

  const result = await shell.exec(executable, ['-NoProfile', '-NonInteractive', '-Command', script]);
  if (!result || result.exitCode !== 0) return null;
  return result.stdout;
}

/**
 * Query a management class through WMI, falling back to CIM, and return the
 * first non-blank output line. `pipeline` is applied to the class instances,
 * e.g. `Select-Object -First 1 -ExpandProperty Name`.
 */
export async function queryManagement(
  shell: HostShell,
  className: string,
  pipeline: string,
): Promise<string | null> {
  const wmi = firstLine(await runPowerShell(shell, `Get-WmiObject -Class ${className} | ${pipeline}`));
  if (wmi) return wmi;
  return firstLine(await runPowerShell(shell, `Get-CimInstance -ClassName ${className} | ${pipeline}`));
}

/**
 * Run a script ending in `ConvertTo-Json` and keep the items that validate. PowerShell
 * emits a bare object instead of an array when there is exactly one item.
 */
export async function queryPowerShellJson<T>(
  shell: HostShell,
  script: string,
  itemSchema: z.ZodType<T, z.ZodTypeDef, unknown>,
): Promise<T[]> {
  const output = await runPowerShell(shell, script);
  if (!output || output.trim().length === 0) return [];

  let parsed: unknown;
  try {
    parsed = JSON.parse(output);
  } catch {
    return [];
  }

  // A malformed item is dropped; the rest are kept.
  const items: unknown[] = Array.isArray(parsed) ? parsed : [parsed];
  return items.flatMap((item) => {
    const result = itemSchema.safeParse(item);
    return result.success ? [result.data] : [];
  });
}

/** Single-quote a value for interpolation into a PowerShell script. */
export function quotePowerShell(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}
