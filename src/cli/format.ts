/**
 * Plain-text rendering for CLI output.
 */

import { formatLinkAddress } from '../model/address.js';
import type {
  GraphSnapshot,
  HostRecord,
  InterfaceRecord,
  LinkRecord,
  MergeReport,
} from '../model/graph.js';

const RULE = '  ' + '─'.repeat(40);

export function formatReport(report: MergeReport): string[] {
  const out: string[] = [];
  out.push('');
  out.push(`  Batch ${report.batchId}${report.dryRun ? ' (dry run, nothing saved)' : ''}`);
  out.push(RULE);
  out.push(`  Source:     ${report.sourceHostId}`);
  out.push(`  Accepted:   ${report.accepted} (${report.duplicates} already known)`);
  out.push(`  Rejected:   ${report.rejected}`);
  out.push(`  Created:    ${report.created.hosts.length} hosts, ${report.created.interfaces.length} interfaces, ${report.created.links.length} links`);
  if (report.attempts > 1) out.push(`  Attempts:   ${report.attempts}`);

  if (report.mergedHosts.length > 0) {
    out.push('');
    out.push('  Merged hosts:');
    for (const merge of report.mergedHosts) {
      out.push(`    ${merge.absorbedIds.join(', ')} -> ${merge.survivorId}`);
    }
  }
  if (report.conflicts.length > 0) {
    out.push('');
    out.push('  IP conflicts:');
    for (const conflict of report.conflicts) {
      out.push(`    ${conflict.ip}: ${conflict.interfaceIds.join(', ')}`);
    }
  }
  if (report.reconciledRoutes.length > 0) {
    out.push('');
    out.push(`  Routes re-pointed: ${report.reconciledRoutes.length}`);
  }
  if (report.errors.length > 0) {
    out.push('');
    out.push('  Rejected records:');
    for (const error of report.errors) {
      out.push(`    #${error.index} [${error.reason}] ${error.message}`);
    }
  }
  out.push('');
  return out;
}

export function formatInterface(record: InterfaceRecord): string {
  const link = record.linkAddress ? formatLinkAddress(record.linkAddress) : record.names.map(n => n.value).join('/');
  const ips = record.addresses.map(a => a.value).join(', ') || '-';
  const conflicts = record.conflicts.length > 0 ? `  ! conflict on ${record.conflicts.map(c => c.ip).join(', ')}` : '';
  return `${record.id}  ${link}  ${ips}${conflicts}`;
}

export function formatHost(host: HostRecord, interfaces: ReadonlyMap<string, InterfaceRecord>): string[] {
  const labels = host.labels.map(label => label.value).join(', ');
  const out = [`  ${host.id}${labels ? `  (${labels})` : ''}`];
  if (host.mergedFrom.length > 0) out.push(`    merged from ${host.mergedFrom.join(', ')}`);
  for (const id of host.interfaceIds) {
    const record = interfaces.get(id);
    out.push(`    ${record ? formatInterface(record) : id}`);
  }
  return out;
}

function formatLink(link: LinkRecord): string {
  const score = link.confidence.toFixed(2);
  if (link.kind === 'adjacency') {
    return `  ${link.endpoints[0]} <-> ${link.endpoints[1]}  [${link.status}, ${score}]`;
  }
  const via = link.gatewayIp === null ? 'on-link' : `via ${link.gatewayIp} -> ${link.to ?? 'unresolved'}`;
  return `  ${link.from} => ${link.destination} ${via} metric ${link.metric}  [${link.status}, ${score}]`;
}

export function formatSnapshot(snapshot: GraphSnapshot): string[] {
  const interfaces = new Map(snapshot.interfaces.map(record => [record.id, record]));
  const out: string[] = [''];

  out.push(`  Hosts (${snapshot.hosts.length})`);
  out.push(RULE);
  for (const host of snapshot.hosts) out.push(...formatHost(host, interfaces));

  out.push('');
  out.push(`  Links (${snapshot.links.length})`);
  out.push(RULE);
  for (const link of snapshot.links) out.push(formatLink(link));

  if (snapshot.placeholders.length > 0) {
    out.push('');
    out.push(`  Unresolved gateways (${snapshot.placeholders.length})`);
    out.push(RULE);
    for (const node of snapshot.placeholders) {
      out.push(`  ${node.gatewayIp}: ${node.destinations.join(', ')}`);
    }
  }
  out.push('');
  return out;
}
