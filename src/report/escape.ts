const HTML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;",
};

export function escapeHtml(text: string | null | undefined): string {
  if (!text) {
    return "";
  }
  return text.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

/** Returns the URL only when it is absolute http(s); anything else renders as plain text. */
export function safeHref(raw: string): string | null {
  try {
    const url = new URL(raw);
    if (url.protocol !== "http:" && url.protocol !== "https:") {
      return null;
    }
    return url.toString();
  } catch {
    return null;
  }
}

/**
 * Renders model prose as HTML. Text is escaped first; afterwards `**bold**`
 * becomes <strong>, blank lines split paragraphs and single newlines become
 * <br>. Markdown headings (`##`, `###`) are rendered as h3/h4.
 */
export function renderProse(text: string): string {
  const blocks = text
    .replace(/\r\n/g, "\n")
    .split(/\n\s*\n/)
    .map((block) => block.trim())
    .filter(Boolean);
  return blocks
    .map((block) => {
      const heading = block.match(/^(#{2,3})\s+(.+)$/);
      if (heading && !block.includes("\n")) {
        const tag = heading[1] === "##" ? "h3" : "h4";
        return `<${tag}>${inlineMarkup(heading[2] ?? "")}</${tag}>`;
      }
      return `<p>${block.split("\n").map(inlineMarkup).join("<br>")}</p>`;
    })
    .join("\n");
}

function inlineMarkup(line: string): string {
  return escapeHtml(line).replace(/\*\*([^*]+)\*\*/g, "<strong>$1</strong>");
}
