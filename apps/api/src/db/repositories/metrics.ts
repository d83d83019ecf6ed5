import { getDatabase } from "../schema.js";
import { groupByParent, indexByParent, requireChild, selectChildren } from "../helpers.js";
import { fromHundredths } from "../../utils/decimal.js";
import type { MetricGraph, ProcessRecord } from "../../services/snapshot-graph.js";
import {
  ProcessType,
  type CpuLoadMetric,
  type DiskUsageMetric,
  type MemoryUsageMetric,
  type MetricData,
  type NetworkUsageMetric,
  type ProcessDetail,
  type TopDiskConsumerMetric,
} from "@hostwatch/shared";

interface MetricDataRow {
  id: number;
  snapshot_id: number;
}

interface TopProcessesRow {
  id: number;
  metric_data_id: number;
}

type MetricChildRow<T> = T & { id: number; metric_data_id: number };
type ProcessRow = ProcessRecord & { id: number; top_processes_metric_id: number };

type WithMetricId<T> = T & { metric_data_id: number };

/**
 * Insert the measurements of a snapshot. Runs inside the caller's transaction.
 */
export function insertMetricData(snapshotId: number, metrics: MetricGraph): number {
  const db = getDatabase();

  const result = db.prepare<[number]>("INSERT INTO metric_data (snapshot_id) VALUES (?)").run(snapshotId);
  const metricDataId = Number(result.lastInsertRowid);

  db.prepare<[WithMetricId<MemoryUsageMetric>]>(`
    INSERT INTO memory_usage_metrics (metric_data_id, total_mb, used_mb, free_mb, available_mb, percentage_used)
    VALUES (@metric_data_id, @total_mb, @used_mb, @free_mb, @available_mb, @percentage_used)
  `).run({ metric_data_id: metricDataId, ...metrics.memoryUsage });

  db.prepare<[WithMetricId<CpuLoadMetric>]>(`
    INSERT INTO cpu_load_metrics (metric_data_id, load_1min, load_5min, load_15min)
    VALUES (@metric_data_id, @load_1min, @load_5min, @load_15min)
  `).run({ metric_data_id: metricDataId, ...metrics.cpuLoad });

  db.prepare<[WithMetricId<NetworkUsageMetric>]>(`
    INSERT INTO network_usage_metrics (metric_data_id, received_bps, transmitted_bps)
    VALUES (@metric_data_id, @received_bps, @transmitted_bps)
  `).run({ metric_data_id: metricDataId, ...metrics.networkUsage });

  const topProcesses = db
    .prepare<[number]>("INSERT INTO top_processes_metrics (metric_data_id) VALUES (?)")
    .run(metricDataId);
  const topProcessesId = Number(topProcesses.lastInsertRowid);

  const insertProcess = db.prepare<[ProcessRecord & { top_processes_metric_id: number }]>(`
    INSERT INTO process_details (top_processes_metric_id, process_type, pid, user, cpu_percent, mem_percent, command)
    VALUES (@top_processes_metric_id, @process_type, @pid, @user, @cpu_percent, @mem_percent, @command)
  `);
  for (const process of metrics.processes) {
    insertProcess.run({ top_processes_metric_id: topProcessesId, ...process });
  }

  const insertDiskUsage = db.prepare<[WithMetricId<DiskUsageMetric>]>(`
    INSERT INTO disk_usage_metrics (metric_data_id, filesystem, percentage_used, total_size, used_size, available_size)
    VALUES (@metric_data_id, @filesystem, @percentage_used, @total_size, @used_size, @available_size)
  `);
  for (const usage of metrics.diskUsage) {
    insertDiskUsage.run({ metric_data_id: metricDataId, ...usage });
  }

  const insertConsumer = db.prepare<[WithMetricId<TopDiskConsumerMetric>]>(`
    INSERT INTO top_disk_consumer_metrics (metric_data_id, size, path)
    VALUES (@metric_data_id, @size, @path)
  `);
  for (const consumer of metrics.topDiskConsumers) {
    insertConsumer.run({ metric_data_id: metricDataId, ...consumer });
  }

  return metricDataId;
}

function rowToProcess(row: ProcessRow): ProcessDetail {
  return {
    pid: row.pid,
    user: row.user,
    cpu_percent: fromHundredths(row.cpu_percent),
    mem_percent: fromHundredths(row.mem_percent),
    command: row.command,
  };
}

/**
 * Get the measurements of many snapshots at once, keyed by snapshot ID
 */
export function getMetricsBySnapshots(snapshotIds: number[]): Map<number, MetricData> {
  const rows = selectChildren<MetricDataRow>("metric_data", "snapshot_id", snapshotIds);
  const ids = rows.map((row) => row.id);

  const memoryUsage = indexByParent(
    selectChildren<MetricChildRow<MemoryUsageMetric>>("memory_usage_metrics", "metric_data_id", ids),
    "metric_data_id"
  );
  const cpuLoad = indexByParent(
    selectChildren<MetricChildRow<CpuLoadMetric>>("cpu_load_metrics", "metric_data_id", ids),
    "metric_data_id"
  );
  const networkUsage = indexByParent(
    selectChildren<MetricChildRow<NetworkUsageMetric>>("network_usage_metrics", "metric_data_id", ids),
    "metric_data_id"
  );
  const topProcessRows = selectChildren<TopProcessesRow>("top_processes_metrics", "metric_data_id", ids);
  const topProcesses = indexByParent(topProcessRows, "metric_data_id");
  const processes = groupByParent(
    selectChildren<ProcessRow>(
      "process_details",
      "top_processes_metric_id",
      topProcessRows.map((row) => row.id)
    ),
    "top_processes_metric_id"
  );
  const diskUsage = groupByParent(
    selectChildren<MetricChildRow<DiskUsageMetric>>("disk_usage_metrics", "metric_data_id", ids),
    "metric_data_id"
  );
  const topDiskConsumers = groupByParent(
    selectChildren<MetricChildRow<TopDiskConsumerMetric>>("top_disk_consumer_metrics", "metric_data_id", ids),
    "metric_data_id"
  );

  const result = new Map<number, MetricData>();
  for (const row of rows) {
    const memoryRow = requireChild(memoryUsage, row.id, "memory_usage_metrics");
    const loadRow = requireChild(cpuLoad, row.id, "cpu_load_metrics");
    const networkRow = requireChild(networkUsage, row.id, "network_usage_metrics");
    const topRow = requireChild(topProcesses, row.id, "top_processes_metrics");
    const processRows = processes.get(topRow.id) ?? [];

    result.set(row.snapshot_id, {
      memory_usage: {
        total_mb: memoryRow.total_mb,
        used_mb: memoryRow.used_mb,
        free_mb: memoryRow.free_mb,
        available_mb: memoryRow.available_mb,
        percentage_used: fromHundredths(memoryRow.percentage_used),
      },
      cpu_load: {
        load_1min: fromHundredths(loadRow.load_1min),
        load_5min: fromHundredths(loadRow.load_5min),
        load_15min: fromHundredths(loadRow.load_15min),
      },
      network_usage: {
        received_bps: fromHundredths(networkRow.received_bps),
        transmitted_bps: fromHundredths(networkRow.transmitted_bps),
      },
      top_processes: {
        by_cpu: processRows.filter((p) => p.process_type === ProcessType.Cpu).map(rowToProcess),
        by_memory: processRows.filter((p) => p.process_type === ProcessType.Memory).map(rowToProcess),
      },
      disk_usage: (diskUsage.get(row.id) ?? []).map((usage) => ({
        filesystem: usage.filesystem,
        percentage_used: fromHundredths(usage.percentage_used),
        total_size: usage.total_size,
        used_size: usage.used_size,
        available_size: usage.available_size,
      })),
      top_disk_consumers: (topDiskConsumers.get(row.id) ?? []).map((consumer) => ({
        size: consumer.size,
        path: consumer.path,
      })),
    });
  }
  return result;
}
