import { load, type CheerioAPI } from "cheerio"
import type { AnyNode } from "domhandler"
import type { UrlContent } from "../types"

const IGNORED_TAGS = ["script", "style", "nav", "footer", "header", "aside", "noscript", "iframe", "form"]
const MAX_META_KEYWORDS = 10

export const TRUNCATION_MARKER = "..."

export function extractUrlContent(url: string, html: string, maxChars: number): UrlContent {
  const $ = load(html)

  const title = $("title").first().text().trim() || metaContent($, 'meta[property="og:title"]')
  const description =
    metaContent($, 'meta[name="description"]') || metaContent($, 'meta[property="og:description"]')
  const keywords = metaContent($, 'meta[name="keywords"]')
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0)
    .slice(0, MAX_META_KEYWORDS)

  $(IGNORED_TAGS.join(", ")).remove()

  let root = $("article").first()
  if (root.length === 0) {
    root = $("main").first()
  }
  if (root.length === 0) {
    root = $("body").first()
  }

  const content = root.length > 0 ? normalizeText(collectText(root.toArray()), maxChars) : ""

  return { url, title, description, content, keywords }
}

export function normalizeText(input: string, maxChars: number): string {
  let text = input.replace(/\n{3,}/g, "\n\n").replace(/[ \t]+/g, " ")
  if (text.length > maxChars) {
    text = text.slice(0, maxChars) + TRUNCATION_MARKER
  }
  return text.trim()
}

function metaContent($: CheerioAPI, selector: string): string {
  return ($(selector).first().attr("content") ?? "").trim()
}

// Each non-empty text node on its own line, in document order.
function collectText(nodes: AnyNode[]): string {
  const parts: string[] = []

  const visit = (list: AnyNode[]): void => {
    for (const node of list) {
      if ("data" in node) {
        if (node.nodeType !== 3) {
          continue
        }
        const text = node.data.trim()
        if (text) {
          parts.push(text)
        }
      } else if ("children" in node) {
        visit(node.children)
      }
    }
  }

  visit(nodes)
  return parts.join("\n")
}
