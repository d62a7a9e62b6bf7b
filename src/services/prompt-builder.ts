import type { ArticleLanguage, ArticleLength, ArticleStyle, UrlContent } from "../types"

export interface PromptPair {
  system: string
  user: string
}

export interface PromptOptions {
  language: ArticleLanguage
  style: ArticleStyle
  length: ArticleLength
  useEmoji: boolean
  guide?: string
}

export interface KeywordPromptInput extends PromptOptions {
  keyword: string
  evidence?: string
  referenceContent?: string
}

export interface UrlPromptInput extends PromptOptions {
  content: UrlContent
  evidence?: string
}

export const MAX_REFERENCE_CHARS = 4_000
export const MAX_SOURCE_CHARS = 6_000

const STYLE_DESCRIPTIONS: Record<ArticleStyle, string> = {
  정보성: "유용한 정보를 체계적으로 정리한 설명형",
  리뷰: "주관적인 경험과 의견이 담긴 리뷰형",
  "How-to": "단계별로 따라 할 수 있는 가이드형",
  뉴스해설: "최근 이슈를 요약하고 의견을 덧붙이는 해설형",
}

const LENGTH_DESCRIPTIONS: Record<ArticleLength, string> = {
  short: "본문 400~600자 분량",
  medium: "본문 800~1,200자 분량",
  long: "본문 1,200~1,800자 분량",
}

export const SYSTEM_PROMPT = [
  "You are an expert blog writer for Tistory. Your output must be valid Markdown only,",
  "no code fences or extra labels. Use ## for sections, ### for subsections,",
  "**bold**, lists, and short paragraphs. No YAML frontmatter.",
].join(" ")

const TONE_REQUIREMENTS = [
  "- **글체**: 편안하고 부드러운 톤으로 써 주세요. '서론', '결론', '본론', '이에 대해', '다음과 같이', '정리하면' 같은 딱딱하거나 격식 있는 표현은 쓰지 말고, 구어체에 가까운 친근한 문장으로 자연스럽게 이어 주세요.",
  "- 소제목(##, ###)으로 읽기 쉽게 구분하되, '서론/결론'처럼 형식을 드러내는 제목은 쓰지 마세요.",
  "- 자연스럽고 SEO에 유리한 문장",
  "- 마지막은 따로 '결론'이라 부르지 말고, 이야기를 부드럽게 마무리하는 문단 1~2개",
  "- 글 끝에 #태그1 #태그2 #태그3 ... 형태로 태그 5~10개를 한 줄에 붙여 주세요. (주제·키워드·SEO 관련, 공백으로 구분)",
]

export function buildKeywordPrompts(input: KeywordPromptInput): PromptPair {
  const sections = [
    [
      "다음 키워드를 주제로 티스토리 블로그 글을 마크다운으로 작성해 주세요.",
      "",
      `키워드: ${input.keyword}`,
      ...articleDirectives(input),
      "",
      "요구사항:",
      `- ${LENGTH_DESCRIPTIONS[input.length]} (의미 있는 문단/문장 기준)`,
      ...TONE_REQUIREMENTS,
      emojiDirective(input.useEmoji),
    ].join("\n"),
  ]

  appendBlock(
    sections,
    "아래는 이 키워드에 대한 최신 웹 검색 결과와 **뉴스 기사**입니다. 뉴스(일반 뉴스·구글 뉴스 등)를 특히 참고하여 **최신 동향·숫자·사실·시사**를 반영하고, 독자가 관심 가질 만한 시의성 있는 내용을 담아 주세요. 원문을 그대로 복사하지 말고 재해석하여 자연스럽게 활용하세요.",
    input.evidence,
  )
  appendGuide(sections, input.guide)
  appendBlock(
    sections,
    "아래는 **참고해야 할 URL의 콘텐츠**입니다. 이 내용을 참고하여 글을 작성해 주세요. 원문을 그대로 복사하지 말고 참고만 하세요:",
    input.referenceContent?.trim().slice(0, MAX_REFERENCE_CHARS),
  )

  return { system: SYSTEM_PROMPT, user: sections.join("\n\n") }
}

export function buildUrlPrompts(input: UrlPromptInput): PromptPair {
  const source = [`URL: ${input.content.url}`]
  if (input.content.title) {
    source.push(`제목: ${input.content.title}`)
  }
  if (input.content.description) {
    source.push(`설명: ${input.content.description}`)
  }

  const sections = [
    [
      "다음 URL의 콘텐츠를 분석하여 관련된 티스토리 블로그 글을 마크다운으로 작성해 주세요.",
      "",
      ...source,
      "",
      "--- 원본 콘텐츠 ---",
      input.content.content.slice(0, MAX_SOURCE_CHARS),
      "---",
      "",
      ...articleDirectives(input),
      "",
      "요구사항:",
      `- ${LENGTH_DESCRIPTIONS[input.length]} (의미 있는 문단/문장 기준)`,
      "- 원본 URL의 내용을 그대로 복사하지 말고, 핵심 내용을 파악하여 **새로운 관점**으로 재구성해 주세요",
      "- 원본의 주제를 확장하거나, 독자에게 더 유용한 정보를 추가해 주세요",
      ...TONE_REQUIREMENTS,
      emojiDirective(input.useEmoji),
    ].join("\n"),
  ]

  appendBlock(
    sections,
    "아래는 이 주제와 관련된 최신 웹 검색 결과와 **뉴스 기사**입니다. 이를 참고하여 **최신 동향·숫자·사실·시사**를 반영하고, 독자가 관심 가질 만한 시의성 있는 내용을 담아 주세요. 원문을 그대로 복사하지 말고 재해석하여 자연스럽게 활용하세요.",
    input.evidence,
  )
  appendGuide(sections, input.guide)

  return { system: SYSTEM_PROMPT, user: sections.join("\n\n") }
}

function articleDirectives(options: PromptOptions): string[] {
  const korean = options.language === "ko"
  return [
    `글 스타일: ${STYLE_DESCRIPTIONS[options.style]}`,
    korean ? "반드시 한국어로만 작성하세요." : "Write in English only.",
    korean ? "첫 번째 # 제목을 글의 메인 제목으로 사용하세요." : "Use the first # heading as the main title.",
  ]
}

function emojiDirective(useEmoji: boolean): string {
  return useEmoji
    ? "- 제목, 소제목, 문단에 주제에 맞는 이모지를 적당히 넣어 주세요. 과하지 않게 사용하세요."
    : "- 이모지는 사용하지 마세요."
}

function appendGuide(sections: string[], guide: string | undefined): void {
  appendBlock(
    sections,
    "아래는 사용자가 요청한 **글 작성 가이드**입니다. 이 가이드를 최우선으로 반영하여 글을 작성해 주세요:",
    guide,
  )
}

/** Adds an intro line and a `---`-delimited body, skipping blank bodies. */
function appendBlock(sections: string[], intro: string, body: string | undefined): void {
  const trimmed = body?.trim()
  if (!trimmed) {
    return
  }

  sections.push(`${intro}\n\n---\n${trimmed}\n---`)
}
