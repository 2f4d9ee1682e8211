/**
 * RRset grouping
 * Collapses records sharing (type, name) into one ZoneResource, in first-seen order
 */
import { MalformedRecordError } from '../core/errors.js';
import type { ResourceKey, ZoneRecord, ZoneResource } from '../types/index.js';
import { relativeName } from './names.js';
import { formatRdata } from './rdata.js';

export interface TtlConflict {
  key: ResourceKey;
  kept: number;
  ignored: number;
}

export interface GroupResult {
  resources: ZoneResource[];
  /** rrdatas dropped because an identical value was already in the set */
  duplicates: number;
  ttlConflicts: TtlConflict[];
}

interface PendingGroup {
  key: ResourceKey;
  ttl: number | undefined;
  rrdatas: string[];
  seen: Set<string>;
}

export function keyId(key: ResourceKey): string {
  return `${key.type}:${key.name}`;
}

/**
 * Group records into RRsets.
 *
 * TTL of a set is the first TTL seen for it (`defaultTtl` when none of its
 * records carry one); differing TTLs are reported, not applied.
 */
export function groupRecords(records: readonly ZoneRecord[], domain: string, defaultTtl: number): GroupResult {
  const groups = new Map<string, PendingGroup>();
  const ttlConflicts: TtlConflict[] = [];
  let duplicates = 0;

  for (const record of records) {
    const key: ResourceKey = { type: record.kind, name: record.name };
    const id = keyId(key);

    let group = groups.get(id);
    if (!group) {
      group = { key, ttl: undefined, rrdatas: [], seen: new Set() };
      groups.set(id, group);
    }

    if (record.ttl !== undefined) {
      if (group.ttl === undefined) {
        group.ttl = record.ttl;
      } else if (group.ttl !== record.ttl) {
        ttlConflicts.push({ key, kept: group.ttl, ignored: record.ttl });
      }
    }

    const rrdata = formatRdata(record);
    if (group.seen.has(rrdata)) {
      duplicates++;
      continue;
    }

    // A CNAME owner holds exactly one target
    if (record.kind === 'CNAME' && group.rrdatas.length > 0) {
      throw new MalformedRecordError(
        domain,
        record.source,
        `${record.name} already has CNAME target ${group.rrdatas[0]}`
      );
    }

    group.seen.add(rrdata);
    group.rrdatas.push(rrdata);
  }

  const resources = Array.from(groups.values(), (group): ZoneResource =>
    Object.freeze({
      key: Object.freeze({ ...group.key }),
      ttl: group.ttl ?? defaultTtl,
      rrdatas: Object.freeze([...group.rrdatas]),
      relativeName: relativeName(group.key.name, domain),
    })
  );

  return { resources, duplicates, ttlConflicts };
}
