import { Phase } from '../models/types.js';

interface PhaseRule {
  phase: Phase;
  markers: string[];
}

// Checked top to bottom; the first rule with a matching marker wins.
const PHASE_RULES: readonly PhaseRule[] = [
  { phase: Phase.DetectingSpeech, markers: ['Performing VAD', 'voice activity detection'] },
  { phase: Phase.Transcribing, markers: ['Performing transcription'] },
  { phase: Phase.Aligning, markers: ['Performing alignment'] },
  { phase: Phase.Diarizing, markers: ['Performing diarization'] },
];

const LABELS: Record<Phase, string> = {
  [Phase.Initializing]: 'Initializing...',
  [Phase.DetectingSpeech]: '1/4 Detecting speech (VAD)...',
  [Phase.Transcribing]: '2/4 Transcribing...',
  [Phase.Aligning]: '3/4 Aligning timestamps...',
  [Phase.Diarizing]: '4/4 Diarizing speakers (may take a while)...',
  [Phase.Finalizing]: 'Finalizing...',
};

export function matchPhase(line: string): Phase | undefined {
  for (const rule of PHASE_RULES) {
    if (rule.markers.some((m) => line.includes(m))) return rule.phase;
  }
  return undefined;
}

/** Next phase for a diagnostic line. Never moves backwards; unknown lines keep the current phase. */
export function classifyLine(current: Phase, line: string): Phase {
  const matched = matchPhase(line);
  if (matched === undefined) return current;
  return matched > current ? matched : current;
}

export function phaseLabel(phase: Phase) {
  return LABELS[phase];
}

export function phaseName(phase: Phase) {
  return Phase[phase];
}
