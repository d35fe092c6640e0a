export const TRACK_EXTRACTION_FORMAT = "Title: [song name] | Artist: [artist name]";

export function DETECT_INTENT_TEMPLATE(userInput: string): string {
  return `
Is the following user input asking for music-related trivia (e.g. about a person, history, or music fact)?
Return only "trivia" or "track".
Input: "${userInput}"
  `;
}

export function EXTRACT_TRACK_FROM_ANSWER_TEMPLATE(answer: string): string {
  return `
Extract the song title and artist from the following response.
Return in format: "${TRACK_EXTRACTION_FORMAT}".
Response: '${answer}'
  `;
}

export function EXTRACT_TRACK_FROM_RESULTS_TEMPLATE(results: string): string {
  return `
Extract a relevant song title and artist from the search results below:
Format: "${TRACK_EXTRACTION_FORMAT}"
Results: ${results}
  `;
}

export function TRIVIA_ANSWER_TEMPLATE(question: string, results: string): string {
  return `
Based on the following search results, answer the user's music-related question or provide a fun fact.
Be concise, accurate, and conversational.
Question: ${question}
Results: ${results}
  `;
}
