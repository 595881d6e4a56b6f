/**
 * 從模型回傳的原始文字中取出 JSON。
 *
 * 處理順序：
 * 1. 去除 markdown code fence（```json ... ``` 或 ``` ... ```）
 * 2. 從第一個 `{` 或 `[` 開始截斷前置說明文字
 * 3. 直接 JSON.parse；失敗則由尾端往前尋找對應的 `}` / `]`，並清掉 `,}` 這類尾逗號後再試
 */

export type JsonExtraction = { ok: true; value: unknown } | { ok: false; cleaned: string };

const FENCE_PATTERN = /```(?:json|JSON)?\s*([\s\S]*?)\s*```/;
const TRAILING_COMMA_PATTERN = /,(\s*[}\]])/g;

/**
 * 去除 code fence；若沒有成對的 fence，則只移除殘留的 ``` 標記。
 */
export function stripCodeFences(raw: string): string {
  const trimmed = raw.trim();
  const fenced = FENCE_PATTERN.exec(trimmed);
  if (fenced) {
    return fenced[1].trim();
  }
  return trimmed.replace(/```(?:json|JSON)?/g, "").trim();
}

/**
 * 回傳第一個 `{` 或 `[` 之後的內容（含該字元）；找不到時回傳原字串。
 */
export function stripLeadingProse(text: string): string {
  const firstBrace = text.indexOf("{");
  const firstBracket = text.indexOf("[");
  const candidates = [firstBrace, firstBracket].filter((index) => index !== -1);
  if (candidates.length === 0) {
    return text;
  }
  return text.slice(Math.min(...candidates));
}

function tryParse(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

export function extractJson(raw: string): JsonExtraction {
  const cleaned = stripLeadingProse(stripCodeFences(raw));

  const direct = tryParse(cleaned);
  if (direct.ok) {
    return direct;
  }

  const opener = cleaned[0];
  const closer = opener === "[" ? "]" : opener === "{" ? "}" : undefined;
  if (!closer) {
    return { ok: false, cleaned };
  }

  // trailing prose after the JSON value: try progressively shorter candidates
  for (let end = cleaned.length - 1; end > 0; end--) {
    if (cleaned[end] !== closer) continue;
    const candidate = cleaned.slice(0, end + 1).replace(TRAILING_COMMA_PATTERN, "$1");
    const parsed = tryParse(candidate);
    if (parsed.ok) {
      return parsed;
    }
  }

  return { ok: false, cleaned };
}
