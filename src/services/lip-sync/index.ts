export {
  extractVisemes,
  debounceOpenRuns,
  frameCountFor,
  DEFAULT_MIN_OPEN_FRAMES,
  DEFAULT_OPEN_THRESHOLD,
} from './viseme-extractor'
export { decodeWaveform, readWaveform, waveformDurationSec } from './wav-reader'
export { buildVisemeTrack, buildVisemeTracks, type VisemeTrackOptions } from './viseme-tracks'
