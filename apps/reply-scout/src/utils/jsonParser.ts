/**
 * Pulls the first JSON object or array out of a model response, tolerating
 * markdown code fences and surrounding prose.
 */
export const jsonParser = (input: string): unknown => {
  if (!input || !input.trim()) {
    throw new Error("Input string is empty");
  }

  let cleaned = input.trim();

  // Remove markdown code fences if present
  cleaned = cleaned.replace(/```(?:json)?\s*/gi, "").replace(/```/g, "");

  // Find JSON object or array in the response
  const jsonMatch = cleaned.match(/(\{[\s\S]*\}|\[[\s\S]*\])/);

  const parsed: unknown = jsonMatch
    ? JSON.parse(jsonMatch[0])
    : JSON.parse(cleaned);

  return parsed;
};
