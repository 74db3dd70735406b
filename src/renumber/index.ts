/**
 * Section renumbering engine.
 */

export { getPageNumber, incrementLast, replacePrefix, startsWithNumber, numberPattern } from './number.js'
export { locateSiblings, findParent, findPage, collectTargets, flattenPages, walkSubtree, walkForest } from './tree.js'
export type { SiblingLocation } from './tree.js'
export { planRenumber, analyzeRenumber } from './planner.js'
export type { PlanEntry, RenumberIssue, RenumberOutcome } from './planner.js'
export { applyRenumbering } from './patcher.js'
export type { PatchedText } from './patcher.js'
export { makeDiff } from './diff.js'
export { buildRenumberPatches } from './patches.js'
export type { PagePatch, PagePlacement, PageText } from './patches.js'
