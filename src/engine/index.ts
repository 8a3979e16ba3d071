export { WeightedMixer, mixPlaylists } from './WeightedMixer.js';
export { ConstraintPolicy } from './ConstraintPolicy.js';
export { MixRunState, type RunStateView } from './MixRunState.js';
export { excludeSharedTracks, type SharedTrackExclusion } from './sharedTracks.js';
