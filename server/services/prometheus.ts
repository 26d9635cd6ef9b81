import type { NodeSnapshot } from '../types.js';

function esc(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/"/g, '\\"');
}

function line(name: string, labels: Record<string, string>, value: number): string {
  const labelText = Object.entries(labels)
    .map(([k, v]) => `${k}="${esc(v)}"`)
    .join(',');
  return `${name}{${labelText}} ${Number.isFinite(value) ? value : 0}`;
}

function metricMeta(name: string, type: 'gauge' | 'counter', help: string): string[] {
  return [`# HELP ${name} ${help}`, `# TYPE ${name} ${type}`];
}

export function toPrometheusText(snapshot: NodeSnapshot): string {
  const out: string[] = [];
  const common = { node_id: snapshot.nodeId, kind: snapshot.kind };
  const { stats } = snapshot;

  out.push(...metricMeta('pipeline_node_info', 'gauge', 'Static node identity labels.'));
  out.push(line('pipeline_node_info', common, 1));

  out.push(...metricMeta('pipeline_node_received_total', 'counter', 'Messages received by the node.'));
  out.push(line('pipeline_node_received_total', common, stats.received));
  out.push(...metricMeta('pipeline_node_processed_total', 'counter', 'Requests taken off the node queue.'));
  out.push(line('pipeline_node_processed_total', common, stats.processed));
  out.push(...metricMeta('pipeline_node_forwarded_total', 'counter', 'Messages delivered downstream.'));
  out.push(line('pipeline_node_forwarded_total', common, stats.forwarded));
  out.push(...metricMeta('pipeline_node_forward_failures_total', 'counter', 'Downstream deliveries that failed.'));
  out.push(line('pipeline_node_forward_failures_total', common, stats.forwardFailures));
  out.push(...metricMeta('pipeline_node_rejected_total', 'counter', 'Requests rejected at enqueue.'));
  out.push(line('pipeline_node_rejected_total', common, stats.rejected));

  out.push(...metricMeta('pipeline_node_wait_avg_ms', 'gauge', 'Average queue wait in milliseconds.'));
  out.push(line('pipeline_node_wait_avg_ms', common, stats.avgWaitMs));
  out.push(...metricMeta('pipeline_node_queue_length_avg', 'gauge', 'Average sampled queue length.'));
  out.push(line('pipeline_node_queue_length_avg', common, stats.avgQueueLength));

  if (snapshot.queueDepth !== undefined) {
    out.push(...metricMeta('pipeline_node_queue_depth', 'gauge', 'Current queue depth.'));
    out.push(line('pipeline_node_queue_depth', common, snapshot.queueDepth));
  }
  if (snapshot.queueDepthByPriority) {
    out.push(...metricMeta('pipeline_node_queue_depth_by_priority', 'gauge', 'Current queue depth per priority level.'));
    for (const [priority, depth] of Object.entries(snapshot.queueDepthByPriority)) {
      out.push(line('pipeline_node_queue_depth_by_priority', { ...common, priority }, depth));
    }
  }
  if (snapshot.availability) {
    out.push(...metricMeta('pipeline_node_available', 'gauge', 'Availability encoded as AVAILABLE=1, FAILED=0.'));
    out.push(line('pipeline_node_available', common, snapshot.availability === 'AVAILABLE' ? 1 : 0));
  }
  if (snapshot.routingTable) {
    out.push(...metricMeta('pipeline_node_routing_table_size', 'gauge', 'Targets in the rotation.'));
    out.push(line('pipeline_node_routing_table_size', common, snapshot.routingTable.length));
  }
  if (snapshot.instanceCounts) {
    out.push(...metricMeta('pipeline_node_role_instances', 'gauge', 'Running instances per first-tier role.'));
    for (const [role, count] of Object.entries(snapshot.instanceCounts)) {
      out.push(line('pipeline_node_role_instances', { ...common, role }, count));
    }
  }
  if (snapshot.outcomes) {
    out.push(...metricMeta('pipeline_node_request_outcomes', 'gauge', 'Client requests by outcome (pending|successful|failed).'));
    for (const [outcome, count] of Object.entries(snapshot.outcomes)) {
      out.push(line('pipeline_node_request_outcomes', { ...common, outcome }, count));
    }
  }

  out.push(...metricMeta('pipeline_node_snapshot_timestamp_ms', 'gauge', 'Snapshot wall-clock timestamp in unix milliseconds.'));
  out.push(line('pipeline_node_snapshot_timestamp_ms', common, snapshot.snapshotAt));
  return `${out.join('\n')}\n`;
}
