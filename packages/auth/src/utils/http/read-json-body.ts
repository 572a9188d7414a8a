/**
 * Reads a response body as JSON.
 * @returns The parsed document, or undefined for an empty or non-JSON body
 * @internal
 */
export async function readJsonBody(response: Response): Promise<unknown> {
  let text: string;
  try {
    text = await response.text();
  } catch {
    return undefined;
  }
  if (!text.trim()) return undefined;
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}
