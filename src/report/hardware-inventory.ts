// hardware-inventory.ts - Block device and LVM listings printed for reference (never scored)
import { AnalyzerLogger } from '../common/logger';
import { commandExists, ToolRunner } from '../common/exec';
import { InventorySection } from './report-renderer';

interface InventoryTool {
  title: string;
  command: string;
  args: string[];
}

const INVENTORY_TOOLS: InventoryTool[] = [
  {
    title: 'Block devices and volumes (lsblk)',
    command: 'lsblk',
    args: ['-o', 'NAME,KNAME,TYPE,SIZE,FSTYPE,MOUNTPOINTS']
  },
  {
    title: 'LVM logical volumes (lvs)',
    command: 'lvs',
    args: []
  }
];

export async function collectHardwareInventory(
  runner: ToolRunner,
  logger: AnalyzerLogger
): Promise<InventorySection[]> {
  const sections: InventorySection[] = [];

  for (const tool of INVENTORY_TOOLS) {
    if (!(await commandExists(runner, tool.command))) {
      logger.debug('Inventory tool not installed', { command: tool.command });
      continue;
    }
    const result = await runner(tool.command, tool.args, { timeoutMs: 10000 });
    if (!result.ok) {
      logger.debug('Inventory tool failed', { command: tool.command, reason: result.stderr.trim() });
      continue;
    }
    const lines = result.stdout.split('\n').filter(line => line.trim().length > 0);
    sections.push({ title: tool.title, lines });
  }

  return sections;
}
