// lib/video/audio.ts
import type { AudioHints, Transcoder } from "../curation/types";

export const AUDIO_SAMPLE_RATE = 16_000;

/** 20 ms at 16 kHz */
export const WINDOW_SAMPLES = 320;

export const SPEECH_RMS_THRESHOLD = 0.02;
export const SPEECH_WINDOW_RATIO = 0.2;

function windowRms(pcm: Int16Array, from: number, to: number): number {
  let sum = 0;
  for (let i = from; i < to; i++) {
    const s = pcm[i] / 32767;
    sum += s * s;
  }
  return Math.sqrt(sum / (to - from));
}

/**
 * Speech hint from mono 16 kHz PCM.
 * The trailing partial window counts as a window.
 */
export function analyzeSpeech(pcm: Int16Array): AudioHints {
  if (pcm.length === 0) return { has_speech: false, rms: 0 };

  const levels: number[] = [];
  for (let i = 0; i < pcm.length; i += WINDOW_SAMPLES) {
    levels.push(windowRms(pcm, i, Math.min(pcm.length, i + WINDOW_SAMPLES)));
  }

  const loud = levels.filter((v) => v >= SPEECH_RMS_THRESHOLD).length;
  const rms = levels.reduce((a, b) => a + b, 0) / levels.length;

  return {
    has_speech: loud / levels.length >= SPEECH_WINDOW_RATIO,
    rms: Math.min(1, rms),
  };
}

/**
 * Best-effort: a decode failure yields null, never an error.
 */
export async function audioHintsFor(transcoder: Transcoder, clipPath: string): Promise<AudioHints | null> {
  try {
    return analyzeSpeech(await transcoder.decodeAudioPcm(clipPath));
  } catch {
    return null;
  }
}
