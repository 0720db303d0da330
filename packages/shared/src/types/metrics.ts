export interface MetricSample {
  host: string;
  index: number;
  value: number;
}

export interface CounterSample {
  instance: string;
  value: number;
}

export interface HostResult {
  host: string;
  /** Mean of the samples, rounded to 2 decimals. Null when polling failed. */
  average: number | null;
  instant: number | null;
  alert: boolean;
  details: string;
  samples: number[];
  error?: string;
}

export interface DiskStatus {
  mount: string;
  freeBytes: number;
  totalBytes: number;
  freePercent: number;
  threshold: number;
  belowThreshold: boolean;
}
