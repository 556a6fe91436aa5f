/**
 * Sync Planner
 *
 * Classifies a (local ledger, remote ledger) pair by their longest common
 * prefix. Because ledgers are append-only, an entry present on both sides
 * must be identical; entries are compared by version string and by a hash
 * of their canonical on-disk JSON.
 *
 * @module sync/planner
 */

import type { Asset, Ledger, Version } from '../versioning/types'
import type { AssetTransfer, RemoteState, SyncPlan, SyncStatus } from './types'
import { versionToJSON, latestVersion } from '../versioning/ledger'
import { hashObject } from './hash'

/**
 * Content hash of a ledger entry
 */
export function entryHash(version: Version): string {
  return hashObject(versionToJSON(version))
}

function sameEntry(a: Version, b: Version): boolean {
  return a.version === b.version && entryHash(a) === entryHash(b)
}

/**
 * Number of leading entries the two ledgers share
 */
export function commonPrefixLength(local: Ledger, remote: Ledger): number {
  const limit = Math.min(local.versions.length, remote.versions.length)
  let length = 0
  while (length < limit) {
    const a = local.versions[length]
    const b = remote.versions[length]
    if (!a || !b || !sameEntry(a, b)) break
    length++
  }
  return length
}

/**
 * Plan a sync between the local ledger and a fetched remote state
 *
 * @example
 * ```typescript
 * const plan = planSync(local, await fetchRemoteState(store, 'roads'))
 * if (plan.status === 'diverged') {
 *   // surface the conflict
 * }
 * ```
 */
export function planSync(local: Ledger, remote: RemoteState): SyncPlan {
  const remoteLedger = remote.ledger
  const commonLength = commonPrefixLength(local, remoteLedger)

  const localExtra = local.versions.slice(commonLength)
  const remoteExtra = remoteLedger.versions.slice(commonLength)

  const status = classify(localExtra.length > 0, remoteExtra.length > 0)
  const inconsistent =
    status === 'diverged' &&
    commonLength === 0 &&
    local.versions.length > 0 &&
    remoteLedger.versions.length > 0

  const common = commonLength > 0 ? local.versions[commonLength - 1] : undefined

  return {
    status,
    inconsistent,
    commonLength,
    commonVersion: common ? common.version : null,
    localVersion: local.currentVersion,
    remoteVersion: remoteLedger.currentVersion,
    localOnly: localExtra.map(v => v.version),
    remoteOnly: remoteExtra.map(v => v.version),
    toPush: assetsToPush(localExtra, remoteLedger),
    toPull: remoteExtra.length > 0 ? assetsToPull(local, remoteLedger) : [],
  }
}

function classify(localAhead: boolean, remoteAhead: boolean): SyncStatus {
  if (localAhead && remoteAhead) return 'diverged'
  if (localAhead) return 'local_ahead'
  if (remoteAhead) return 'remote_ahead'
  return 'up_to_date'
}

function toTransfer(name: string, asset: Asset): AssetTransfer {
  return {
    name,
    sha256: asset.sha256,
    sizeBytes: asset.sizeBytes,
    href: asset.href,
    mtime: asset.mtime,
  }
}

/**
 * Assets of local-only versions whose content no remote version holds
 *
 * Each asset name is taken from the newest local-only version that lists
 * it, since the working copy only holds that content. Older checksums of
 * the same name are never uploaded. One transfer per checksum.
 */
function assetsToPush(localExtra: readonly Version[], remote: Ledger): AssetTransfer[] {
  const known = new Set<string>()
  for (const version of remote.versions) {
    for (const asset of Object.values(version.assets)) {
      known.add(asset.sha256)
    }
  }

  const names = new Set<string>()
  const transfers: AssetTransfer[] = []
  for (const version of [...localExtra].reverse()) {
    for (const [name, asset] of Object.entries(version.assets)) {
      if (names.has(name)) continue
      names.add(name)
      if (known.has(asset.sha256)) continue
      known.add(asset.sha256)
      transfers.push(toTransfer(name, asset))
    }
  }
  return transfers
}

/**
 * Assets of the remote's latest version that the local latest version lacks
 * or records with different content
 */
function assetsToPull(local: Ledger, remote: Ledger): AssetTransfer[] {
  const remoteLatest = latestVersion(remote)
  if (!remoteLatest) return []
  const localAssets = latestVersion(local)?.assets ?? {}

  return Object.entries(remoteLatest.assets)
    .filter(([name, asset]) => localAssets[name]?.sha256 !== asset.sha256)
    .map(([name, asset]) => toTransfer(name, asset))
}

/**
 * One-line summary of a plan
 */
export function describePlan(plan: SyncPlan): string {
  switch (plan.status) {
    case 'up_to_date':
      return `Up to date at ${plan.localVersion ?? '(empty)'}`
    case 'local_ahead':
      return `Local is ahead by ${plan.localOnly.length} version(s): ${plan.localOnly.join(', ')}`
    case 'remote_ahead':
      return `Remote is ahead by ${plan.remoteOnly.length} version(s): ${plan.remoteOnly.join(', ')}`
    case 'diverged':
      return plan.inconsistent
        ? `Local and remote histories share no common version (local: ${plan.localOnly.join(', ')}; remote: ${plan.remoteOnly.join(', ')})`
        : `Local and remote diverged after ${plan.commonVersion ?? '(start)'} (local: ${plan.localOnly.join(', ')}; remote: ${plan.remoteOnly.join(', ')})`
  }
}
