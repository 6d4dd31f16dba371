import { mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { format } from 'date-fns';
import { formatBytes } from '@hostpulse/shared';
import type { DiskEntry, NetworkEntry, Snapshot } from '@hostpulse/shared';
import type { SnapshotStore } from '../snapshot/SnapshotStore.js';

export function escapeHtml(str: string): string {
  return str
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#039;');
}

/** Green below 50%, yellow below 80%, red otherwise. */
export function statusColor(percent: number): string {
  if (percent < 50) return '#28a745';
  if (percent < 80) return '#ffc107';
  return '#dc3545';
}

/** Disks worth showing: pseudo filesystems such as devfs and map auto_home are left out. */
export function mainDisks(disks: readonly DiskEntry[]): DiskEntry[] {
  return disks.filter((d) => !d.filesystem.startsWith('devfs') && !d.filesystem.startsWith('map'));
}

export function activeInterfaces(interfaces: readonly NetworkEntry[]): NetworkEntry[] {
  return interfaces.filter((n) => n.rx_bytes > 0 || n.tx_bytes > 0);
}

const mb = (value: number): string => `${(value / 1024).toFixed(2)} GB`;
const gi = (size: string): string => (size.endsWith('Gi') ? size.replace('Gi', ' GB') : size);
const count = (value: number): string => value.toLocaleString('en-US');

function card(title: string, value: string): string {
  return `<div class="card"><h3>${escapeHtml(title)}</h3><div class="value">${escapeHtml(value)}</div></div>`;
}

function progress(percent: number): string {
  const width = Math.min(100, Math.max(0, percent));
  return `<div class="bar"><div class="fill" style="width:${width}%;background:${statusColor(percent)};">${percent.toFixed(1)}%</div></div>`;
}

function section(title: string, body: string): string {
  return `<section><h2>${escapeHtml(title)}</h2>${body}</section>`;
}

function table(headers: string[], rows: string[][]): string {
  const head = headers.map((h) => `<th>${escapeHtml(h)}</th>`).join('');
  const body = rows.map((cells) => `<tr>${cells.map((c) => `<td>${c}</td>`).join('')}</tr>`).join('');
  return `<table><thead><tr>${head}</tr></thead><tbody>${body}</tbody></table>`;
}

function empty(message: string): string {
  return `<p class="muted">${escapeHtml(message)}</p>`;
}

function cpuSection(snapshot: Snapshot): string {
  const { cpu } = snapshot;
  return section(
    'CPU',
    `<div class="row">` +
      `<div class="card"><h3>CPU Usage</h3><div class="value">${cpu.cpu_usage_percent.toFixed(1)}%</div>${progress(cpu.cpu_usage_percent)}</div>` +
      card('CPU Cores', String(cpu.cpu_cores)) +
      card('Temperature', cpu.cpu_temperature) +
      card('Load Average', cpu.load_average) +
      `</div><p class="muted"><strong>Model:</strong> ${escapeHtml(cpu.cpu_model)}</p>`,
  );
}

function memorySection(snapshot: Snapshot): string {
  const { memory } = snapshot;
  let body =
    `<div class="row">` +
    card('Total Memory', mb(memory.memory_total_mb)) +
    card('Used Memory', mb(memory.memory_used_mb)) +
    card('Available Memory', mb(memory.memory_available_mb)) +
    `</div><h3>Memory Usage</h3>${progress(memory.memory_usage_percent)}`;

  if (memory.swap_total_mb > 0) {
    body +=
      `<div class="row">` +
      card('Total Swap', mb(memory.swap_total_mb)) +
      card('Used Swap', mb(memory.swap_used_mb)) +
      `</div><h3>Swap Usage</h3>${progress(memory.swap_usage_percent)}`;
  }
  return section('Memory', body);
}

function diskSection(snapshot: Snapshot): string {
  const disks = mainDisks(snapshot.disk);
  if (disks.length === 0) return section('Disk', empty('No disk information available'));

  const rows = disks.map((d) => [
    escapeHtml(d.filesystem),
    escapeHtml(gi(d.size)),
    escapeHtml(gi(d.used)),
    escapeHtml(gi(d.available)),
    `<span class="badge" style="background:${statusColor(d.use_percent)};">${d.use_percent}%</span>`,
  ]);
  return section('Disk', table(['Filesystem', 'Size', 'Used', 'Available', 'Usage %'], rows));
}

function gpuSection(snapshot: Snapshot): string {
  const { gpu } = snapshot;
  return section(
    'GPU',
    `<div class="row">` +
      card('GPU Usage', gpu.gpu_usage_percent) +
      card('GPU Temperature', gpu.gpu_temperature) +
      card('GPU Memory', gpu.gpu_memory) +
      `</div>`,
  );
}

function networkSection(snapshot: Snapshot): string {
  const interfaces = activeInterfaces(snapshot.network);
  if (interfaces.length === 0) return section('Network', empty('No active network interfaces'));

  const rows = interfaces.map((n) => [
    escapeHtml(n.interface),
    escapeHtml(n.ip_address),
    formatBytes(n.rx_bytes),
    formatBytes(n.tx_bytes),
    count(n.rx_packets),
    count(n.tx_packets),
  ]);
  return section(
    'Network',
    table(['Interface', 'IP Address', 'RX Bytes', 'TX Bytes', 'RX Packets', 'TX Packets'], rows),
  );
}

function loadSection(snapshot: Snapshot): string {
  const load = snapshot.system_load;
  const figure = (value: string): string => Number(value).toFixed(2);
  return section(
    'System Load',
    `<div class="row">` +
      card('Load (1 min)', figure(load.load_1min)) +
      card('Load (5 min)', figure(load.load_5min)) +
      card('Load (15 min)', figure(load.load_15min)) +
      card('Uptime', load.uptime) +
      `</div>`,
  );
}

const STYLES = `
body{font-family:-apple-system,BlinkMacSystemFont,'Segoe UI',Roboto,sans-serif;margin:0;padding:20px;background:#f5f5f5;color:#333;}
.container{max-width:1200px;margin:0 auto;background:#fff;border-radius:8px;overflow:hidden;box-shadow:0 2px 4px rgba(0,0,0,0.1);}
header{background:linear-gradient(135deg,#667eea 0%,#764ba2 100%);color:#fff;padding:24px;}
header h1{margin:0;font-size:24px;}
.info{display:flex;gap:32px;padding:12px 24px;background:#f8f9fa;border-bottom:2px solid #e9ecef;}
.info label{display:block;font-size:12px;color:#6c757d;}
section{padding:20px 24px;border-bottom:1px solid #e9ecef;}
section h2{margin:0 0 12px;color:#667eea;font-size:18px;}
.row{display:flex;flex-wrap:wrap;gap:16px;}
.card{flex:1;min-width:180px;background:#f8f9fa;border-left:4px solid #667eea;border-radius:4px;padding:12px;}
.card h3{margin:0 0 6px;font-size:13px;color:#6c757d;}
.value{font-size:20px;font-weight:bold;}
.bar{background:#e9ecef;border-radius:4px;overflow:hidden;margin-top:8px;}
.fill{color:#fff;font-size:12px;padding:2px 6px;white-space:nowrap;}
table{width:100%;border-collapse:collapse;}
th{background:#667eea;color:#fff;text-align:left;padding:8px;}
td{padding:8px;border-bottom:1px solid #e9ecef;}
.badge{color:#fff;border-radius:10px;padding:2px 8px;font-size:12px;}
.muted{color:#6c757d;}
footer{padding:12px 24px;background:#f8f9fa;color:#6c757d;font-size:12px;text-align:center;}
`;

/** Render a snapshot as a standalone HTML page. */
export function renderDashboard(snapshot: Snapshot, generatedAt: Date = new Date()): string {
  return `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="utf-8">
<meta name="viewport" content="width=device-width, initial-scale=1">
<title>System Monitor Dashboard - ${escapeHtml(snapshot.hostname)}</title>
<style>${STYLES}</style>
</head>
<body>
<div class="container">
<header><h1>System Monitor Dashboard</h1><p>System Metrics Overview</p></header>
<div class="info">
<div><label>Hostname</label>${escapeHtml(snapshot.hostname)}</div>
<div><label>Last Update</label>${escapeHtml(snapshot.timestamp)}</div>
<div><label>Uptime</label>${escapeHtml(snapshot.system_load.uptime)}</div>
</div>
${cpuSection(snapshot)}
${memorySection(snapshot)}
${diskSection(snapshot)}
${gpuSection(snapshot)}
${networkSection(snapshot)}
${loadSection(snapshot)}
<footer>Generated on ${format(generatedAt, 'yyyy-MM-dd HH:mm:ss')}</footer>
</div>
</body>
</html>
`;
}

/** Render the persisted snapshot to `file`. Returns the file written. */
export async function writeDashboard(
  store: Pick<SnapshotStore, 'read'>,
  file: string,
  generatedAt: Date = new Date(),
): Promise<string> {
  const snapshot = await store.read();
  await mkdir(dirname(file), { recursive: true });
  await writeFile(file, renderDashboard(snapshot, generatedAt), 'utf-8');
  return file;
}
