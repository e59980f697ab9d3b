export { TimelineStore, type AttachOptions } from './timeline-store.js';
export type { Timeline, TimelineState, TimelineBranch, CreateTimelineInput, BranchComparison } from './types.js';
