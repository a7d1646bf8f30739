import { UpstreamServiceError } from "../errors.js";

const FENCE = /```(?:json)?\s*([\s\S]*?)```/i;

/**
 * Pulls the first parseable JSON object or array out of a model completion,
 * tolerating code fences and prose (including stray brackets) around it.
 */
export function extractJson(text: string): unknown {
  const fenced = FENCE.exec(text);
  const body = (fenced ? fenced[1] : text).trim();

  let firstError: unknown;
  let terminated = false;
  for (let start = body.search(/[[{]/); start >= 0; start = nextOpener(body, start + 1)) {
    const end = body.lastIndexOf(body[start] === "{" ? "}" : "]");
    if (end <= start) continue;
    terminated = true;
    try {
      return JSON.parse(body.slice(start, end + 1));
    } catch (err) {
      firstError ??= err;
    }
  }

  if (!terminated) {
    const message = /[[{]/.test(body) ? "Model output contains unterminated JSON" : "Model output contains no JSON";
    throw new UpstreamServiceError("malformed", message);
  }
  throw new UpstreamServiceError("malformed", "Model output is not valid JSON", { cause: firstError });
}

function nextOpener(body: string, from: number): number {
  const offset = body.slice(from).search(/[[{]/);
  return offset < 0 ? -1 : from + offset;
}
