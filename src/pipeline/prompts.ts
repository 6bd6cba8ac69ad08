/**
 * Prompt templates for answer synthesis
 */

/** Prefix that marks a context block as a video transcript */
export const TRANSCRIPT_MARKER = 'YOUTUBE TRANSCRIPT';

export interface PromptParts {
  history: string;
  context: string;
  query: string;
}

export const INSUFFICIENT_INFORMATION =
  "Based on the provided information, I don't have enough details to answer this question fully";

export function videoSummaryPrompt({ history, context, query }: PromptParts): string {
  return `
You are a factual assistant tasked with summarizing YouTube content. Based STRICTLY on the following YouTube video transcript and metadata, provide a detailed summary of the video.
If the transcript is in a language other than English, it has been automatically translated.

IMPORTANT INSTRUCTIONS:
1. ONLY use information explicitly stated in the provided transcript and metadata
2. DO NOT make up or hallucinate any information not present in the transcript
3. If the transcript is unclear or incomplete, acknowledge these limitations
4. Organize your summary to follow the logical structure of the video
5. Include specific details, quotes, and examples from the transcript to support your summary

Your summary should:
1. Be comprehensive and detailed (at least 5-10 paragraphs)
2. Include key points, main arguments, and important details
3. Maintain the logical flow of the original content
4. Mention any significant examples or evidence presented
5. Conclude with the main takeaways from the video

${history}VIDEO CONTENT:
---
${context}
---

TASK: ${query}

FACTUAL SUMMARY:
`;
}

export function contextAnswerPrompt({ history, context, query }: PromptParts): string {
  return `
You are a factual assistant. Based STRICTLY on the following context and conversation history (if provided), provide a comprehensive answer to the user's query.

IMPORTANT INSTRUCTIONS:
1. ONLY use information explicitly stated in the context below
2. DO NOT use any prior knowledge or information not present in the context
3. If the context doesn't contain enough information to answer the query, state "${INSUFFICIENT_INFORMATION}" and explain what specific information is missing
4. DO NOT make up or hallucinate any information not present in the context
5. When citing facts, refer to specific parts of the context
6. If different sources in the context provide conflicting information, acknowledge this and present both perspectives
7. Maintain a neutral, factual tone throughout your response

${history}CONTEXT:
---
${context}
---

USER QUERY: ${query}

FACTUAL ANSWER:
`;
}
