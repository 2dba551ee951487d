/**
 * Transcript analysis prompt.
 */

const SYSTEM_PROMPT = `You analyze meeting transcripts and report what happened in them.

Rules:
1. Attendees are the people who speak, taken from speaker labels ("Dana:", "[09:15] Lee:") or phrases such as "Priya said".
2. Action items are concrete follow-ups that begin with a verb. Give exactly 3; if the transcript contains fewer, add reasonable follow-up tasks.
3. Use only information present in the transcript.

Respond with ONLY a JSON object, no markdown code fences and no commentary:
{"summary": "<short overview>", "attendees": ["<name>", ...], "action_items": ["<task>", "<task>", "<task>"]}`;

export function buildAnalysisPrompt(transcript: string): { system: string; user: string } {
  const user = `Meeting transcript:
---
${transcript.trim()}
---

Return the JSON object for this transcript.`;

  return { system: SYSTEM_PROMPT, user };
}
