import { describe, expect, it } from 'vitest';
import { classifyLine, matchPhase, phaseLabel } from './phases.js';
import { Phase } from '../models/types.js';

describe('classifyLine', () => {
  it('maps worker markers to phases', () => {
    expect(classifyLine(Phase.Initializing, 'Performing VAD...')).toBe(Phase.DetectingSpeech);
    expect(classifyLine(Phase.Initializing, '>>Performing voice activity detection using Pyannote')).toBe(
      Phase.DetectingSpeech
    );
    expect(classifyLine(Phase.DetectingSpeech, '>>Performing transcription...')).toBe(Phase.Transcribing);
    expect(classifyLine(Phase.Transcribing, '>>Performing alignment...')).toBe(Phase.Aligning);
    expect(classifyLine(Phase.Aligning, '>>Performing diarization...')).toBe(Phase.Diarizing);
  });

  it('keeps the current phase for unrecognized lines', () => {
    expect(classifyLine(Phase.Transcribing, 'Lightning automatically upgraded your loaded checkpoint')).toBe(
      Phase.Transcribing
    );
    expect(classifyLine(Phase.Initializing, '')).toBe(Phase.Initializing);
  });

  it('does not regress when an earlier marker shows up again', () => {
    expect(classifyLine(Phase.Diarizing, 'Performing transcription')).toBe(Phase.Diarizing);
    expect(classifyLine(Phase.Aligning, 'Performing VAD')).toBe(Phase.Aligning);
  });

  it('matches case-sensitively', () => {
    expect(matchPhase('performing transcription')).toBeUndefined();
  });

  it('never moves backwards over any sequence of lines', () => {
    const lines = [
      'Performing diarization',
      'noise',
      'Performing VAD',
      'Performing alignment',
      'Performing transcription',
      'voice activity detection',
    ];
    // Deterministic pseudo-random sequences
    let seed = 7;
    for (let run = 0; run < 50; run++) {
      let phase = Phase.Initializing;
      for (let step = 0; step < 20; step++) {
        seed = (seed * 1103515245 + 12345) % 2147483648;
        const next = classifyLine(phase, lines[seed % lines.length]);
        expect(next).toBeGreaterThanOrEqual(phase);
        phase = next;
      }
    }
  });
});

describe('phaseLabel', () => {
  it('describes each phase', () => {
    expect(phaseLabel(Phase.Transcribing)).toBe('2/4 Transcribing...');
    expect(phaseLabel(Phase.Initializing)).toBe('Initializing...');
  });
});
