export const SUMMARY_SYSTEM_PROMPT =
  'You are an assistant that specializes in summarizing meetings and writing meeting notes.'

/** The five sections every summary must contain, in order. */
export const SUMMARY_SECTIONS = [
  'Main topics discussed',
  'Decisions made',
  'Action items (with owners, when mentioned)',
  'Key points to remember',
  'Next steps',
] as const

/** Build the user message for a meeting summary in `language`. */
export function buildSummaryPrompt(transcript: string, language: string): string {
  const sections = SUMMARY_SECTIONS.map((s, i) => `${i + 1}. ${s}`).join('\n')
  return [
    'You are an expert at summarizing meetings and producing meeting notes.',
    'Below is the transcript of a recorded meeting.',
    'Write a structured summary that includes:',
    '',
    sections,
    '',
    'The summary must be clear, concise and formatted as Markdown.',
    `Summary language: ${language}`,
    '',
    'Transcript:',
    transcript,
  ].join('\n')
}
