/**
 * Prompt texts for the reasoning stages
 */

export const SENTIMENT_SYSTEM_PROMPT = `You analyze the sentiment and tone of spoken content transcribed from videos.
Determine:
1. The overall sentiment: "positive", "negative" or "neutral"
2. A sentiment score between 0.0 (very negative) and 1.0 (very positive), 0.5 being neutral
3. The speaker's predominant tone, in a few words

Respond with a single JSON object:
{"sentiment": "positive" | "negative" | "neutral", "sentiment_score": number, "tone": string}`;

export function sentimentUserPrompt(transcript: string): string {
  return `Analyze the following text extracted from a video:\n\n${transcript}`;
}

export const KEY_POINTS_SYSTEM_PROMPT = `You summarize spoken content and extract its key ideas.
Identify the 3 most important points of the text.
Rules:
- Return exactly 3 points
- Use only information present in the text; if it holds fewer than 3 ideas, fill the remaining points with "N/A"
- Each point is one clear, self-contained, complete sentence
- Prefer main conclusions and insights over details

Respond with a single JSON object:
{"key_points": [string, string, string]}`;

export interface KeyPointsContext {
  sentiment: string;
  sentimentScore: number;
  tone: string;
}

export function keyPointsUserPrompt(transcript: string, context: KeyPointsContext): string {
  return [
    `Prior analysis: sentiment ${context.sentiment} (score ${context.sentimentScore}), tone "${context.tone}".`,
    '',
    'Extract the 3 most important points from the following text:',
    '',
    transcript,
  ].join('\n');
}
