/** Follow-up message asking a structured stage to fix its previous answer. */
export function buildCorrectionPrompt(feedback: string): string {
  return `Your previous response did not match the required format:\n${feedback}\n\nReply again with only the corrected JSON.`;
}
