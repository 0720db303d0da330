import si from 'systeminformation';
import {
  DEFAULT_DISK_MOUNT,
  DiskQueryError,
  errorMessage,
  formatBytes,
  formatPercent,
  getLogger,
  roundTo2,
} from '@fleetwatch/shared';
import type { DiskStatus } from '@fleetwatch/shared';

export interface DiskCheckOptions {
  threshold: number;
  /** Mount point of the volume to check. Defaults to the primary volume. */
  mount?: string;
}

/**
 * Query the free space of one local volume and compare it to the threshold.
 * A volume is below threshold only when its free percentage is strictly
 * lower; exactly the threshold counts as safe.
 */
export async function checkDisk(options: DiskCheckOptions): Promise<DiskStatus> {
  const mount = options.mount ?? DEFAULT_DISK_MOUNT;

  let volumes: Awaited<ReturnType<typeof si.fsSize>>;
  try {
    volumes = await si.fsSize();
  } catch (err) {
    throw new DiskQueryError(`Disk space query failed: ${errorMessage(err)}`);
  }

  const volume = volumes.find((v) => v.mount.toLowerCase() === mount.toLowerCase());
  if (!volume) {
    throw new DiskQueryError(`No volume mounted at ${mount}`);
  }
  if (volume.size <= 0) {
    throw new DiskQueryError(`Volume ${mount} reports a size of 0 bytes`);
  }

  const freePercent = (volume.available * 100) / volume.size;
  const status: DiskStatus = {
    mount: volume.mount,
    freeBytes: volume.available,
    totalBytes: volume.size,
    freePercent: roundTo2(freePercent),
    threshold: options.threshold,
    belowThreshold: freePercent < options.threshold,
  };

  getLogger().debug({ ...status }, 'Disk space checked');
  return status;
}

export function formatDiskStatus(status: DiskStatus): string {
  if (status.belowThreshold) {
    return `Warning: free space on ${status.mount} is below ${status.threshold}% (${formatPercent(status.freePercent)} free)`;
  }
  return `Disk space OK on ${status.mount}: ${formatBytes(status.freeBytes)} free of ${formatBytes(status.totalBytes)} (${formatPercent(status.freePercent)} free)`;
}
