import type { Sentence, SpeakerGroup } from "../types/alignment";

const startGroup = (sentence: Sentence): SpeakerGroup => ({
  speaker: sentence.speaker,
  start: sentence.start,
  end: sentence.end,
  text: sentence.text,
  members: [sentence],
});

/** Fold consecutive same-speaker sentences into matching units, in order. */
export function groupBySpeaker(sentences: Sentence[]): SpeakerGroup[] {
  const groups: SpeakerGroup[] = [];
  let current: SpeakerGroup | undefined;

  for (const sentence of sentences) {
    if (current && current.speaker === sentence.speaker) {
      current.end = sentence.end;
      current.text += sentence.text;
      current.members.push(sentence);
      continue;
    }
    current = startGroup(sentence);
    groups.push(current);
  }

  return groups;
}

export const countSpeakers = (sentences: Sentence[]): number =>
  new Set(sentences.map((sentence) => sentence.speaker)).size;
