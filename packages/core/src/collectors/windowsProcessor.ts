import { firstLine, parseIntegerOrDefault, parseNumericOrDefault, roundTo } from '@hostpulse/shared';
import type { HostShell } from '../exec/HostShell.js';
import { queryManagement, runPowerShell } from '../exec/powershell.js';

// Shared by the Windows CPU and load collectors, which both derive from
// the processor usage counter.

const PROCESSOR_TIME_SCRIPT =
  "Get-Counter '\\Processor(_Total)\\% Processor Time' -ErrorAction SilentlyContinue" +
  ' | Select-Object -ExpandProperty CounterSamples | Select-Object -ExpandProperty CookedValue';

/** Processor usage percent, 0 when neither source yields a decimal. */
export async function windowsCpuUsage(shell: HostShell): Promise<number> {
  let usage = parseNumericOrDefault(firstLine(await runPowerShell(shell, PROCESSOR_TIME_SCRIPT)), -1);

  if (usage < 0) {
    const average = await queryManagement(
      shell,
      'Win32_Processor',
      'Measure-Object -Property LoadPercentage -Average | Select-Object -ExpandProperty Average',
    );
    usage = parseNumericOrDefault(average, 0);
  }

  return Math.min(100, roundTo(usage, 1));
}

export async function windowsLogicalCores(shell: HostShell): Promise<number> {
  const cores = await queryManagement(
    shell,
    'Win32_ComputerSystem',
    'Select-Object -ExpandProperty NumberOfLogicalProcessors',
  );
  return parseIntegerOrDefault(cores, 0);
}
