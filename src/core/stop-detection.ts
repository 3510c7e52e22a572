// =============================================================================
// STOP & RECORDING GAP DETECTION
// =============================================================================

import { ActivityTrack, AnalyticsConfig, RecordingGap, Sample, StopInterval } from '../types/app-types';
import { DEFAULT_ANALYTICS_CONFIG, RECORDING_GAP_THRESHOLD_MS } from './config';
import { DistanceProfile, distanceProfile } from './distance';
import { hasPosition } from '../utils/gps-utils';

interface SampleRun {
  start: number; // index of first sample
  end: number;   // index of last sample
}

function segmentSpeed(samples: readonly Readonly<Sample>[], profile: DistanceProfile, index: number): number | undefined {
  if (index < 1 || index >= samples.length || !profile.segmentKnown[index]) return undefined;

  const elapsedSeconds = (samples[index].timestamp - samples[index - 1].timestamp) / 1000;
  if (elapsedSeconds <= 0) return undefined;

  return (profile.cumulative[index] - profile.cumulative[index - 1]) / elapsedSeconds;
}

/**
 * Speed per sample in m/s: the recorded speed when present, otherwise inferred
 * from the distance step into (or, for the first sample, out of) the sample.
 * Undefined when nothing is known.
 */
export function sampleSpeeds(track: ActivityTrack, profile: DistanceProfile = distanceProfile(track)): (number | undefined)[] {
  const { samples } = track;

  return samples.map((sample, index) => {
    if (sample.speed !== undefined) return sample.speed;
    return segmentSpeed(samples, profile, index) ?? segmentSpeed(samples, profile, index + 1);
  });
}

/**
 * Maximal runs of consecutive samples at or below the stop speed that last at
 * least the minimum stop duration. Samples of unknown speed end a run.
 */
function findStopRuns(track: ActivityTrack, speeds: (number | undefined)[], config: AnalyticsConfig): SampleRun[] {
  const { samples } = track;
  const runs: SampleRun[] = [];
  let runStart = -1;

  const closeRun = (end: number) => {
    if (runStart < 0) return;
    const duration = samples[end].timestamp - samples[runStart].timestamp;
    if (duration >= config.minStopDuration) {
      runs.push({ start: runStart, end });
    }
    runStart = -1;
  };

  speeds.forEach((speed, index) => {
    const stopped = speed !== undefined && speed <= config.stopSpeedThreshold;
    if (stopped) {
      if (runStart < 0) runStart = index;
    } else {
      closeRun(index - 1);
    }
  });
  closeRun(samples.length - 1);

  return runs;
}

/**
 * Detects recording gaps by analyzing timestamp differences between consecutive samples.
 * Gaps occur when a device is paused, switched off or loses signal. Distances are
 * read from the track's distance profile, the same baseline stops use.
 */
export function findRecordingGaps(
  track: ActivityTrack,
  threshold: number = RECORDING_GAP_THRESHOLD_MS,
  profile: DistanceProfile = distanceProfile(track),
): RecordingGap[] {
  const gaps: RecordingGap[] = [];
  const { samples } = track;

  for (let i = 1; i < samples.length; i++) {
    const previousSample = samples[i - 1];
    const currentSample = samples[i];
    const timeDifference = currentSample.timestamp - previousSample.timestamp;

    if (timeDifference > threshold) {
      gaps.push({
        startTime: previousSample.timestamp,
        endTime: currentSample.timestamp,
        gapDuration: timeDifference,
        startDistance: profile.cumulative[i - 1],
        endDistance: profile.cumulative[i],
        startGpsPoint: hasPosition(previousSample) ? [previousSample.latitude, previousSample.longitude] : null,
        endGpsPoint: hasPosition(currentSample) ? [currentSample.latitude, currentSample.longitude] : null,
      });
    }
  }

  return gaps;
}

/**
 * Stop intervals and recording gaps, sorted chronologically.
 */
export function detectStops(track: ActivityTrack, config: AnalyticsConfig = DEFAULT_ANALYTICS_CONFIG): StopInterval[] {
  const profile = distanceProfile(track);
  const speeds = sampleSpeeds(track, profile);
  const { samples } = track;

  const stops: StopInterval[] = findStopRuns(track, speeds, config).map(({ start, end }): StopInterval => ({
    kind: 'stop',
    startTime: samples[start].timestamp,
    endTime: samples[end].timestamp,
    duration: samples[end].timestamp - samples[start].timestamp,
    sampleCount: end - start + 1,
    startDistance: profile.cumulative[start],
    endDistance: profile.cumulative[end],
  }));

  const gaps: StopInterval[] = findRecordingGaps(track, config.recordingGapThreshold, profile).map((gap): StopInterval => ({
    kind: 'gap',
    startTime: gap.startTime,
    endTime: gap.endTime,
    duration: gap.gapDuration,
    sampleCount: 0,
    startDistance: gap.startDistance,
    endDistance: gap.endDistance,
  }));

  return [...stops, ...gaps].sort((a, b) => a.startTime - b.startTime);
}

/**
 * Total milliseconds spent stopped: segments inside a stop run plus segments
 * longer than the recording gap threshold, each counted once.
 */
export function stoppedDuration(
  track: ActivityTrack,
  config: AnalyticsConfig,
  profile: DistanceProfile = distanceProfile(track),
): number {
  const { samples } = track;
  const stoppedSegment = new Array<boolean>(samples.length).fill(false);

  for (const run of findStopRuns(track, sampleSpeeds(track, profile), config)) {
    for (let i = run.start + 1; i <= run.end; i++) {
      stoppedSegment[i] = true;
    }
  }

  let total = 0;
  for (let i = 1; i < samples.length; i++) {
    const duration = samples[i].timestamp - samples[i - 1].timestamp;
    if (stoppedSegment[i] || duration > config.recordingGapThreshold) {
      total += duration;
    }
  }
  return total;
}
