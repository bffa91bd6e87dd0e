import { load } from "cheerio";

const BLOCKS = "div, section, footer";
const CONTACT_PATTERN = /contact|email|phone/i;
const MAX_SECTIONS = 3;
const FALLBACK_CHARS = 5000;

/**
 * Text of the first few div/section/footer blocks that mention contact details,
 * or the head of the page text when there are none.
 */
export function extractContactExcerpt(html: string): string {
  const $ = load(html);
  $("script, style, noscript").remove();

  const sections: string[] = [];
  $(BLOCKS).each((_, el) => {
    if (sections.length >= MAX_SECTIONS) return false;
    const block = $(el);
    if (!CONTACT_PATTERN.test(block.text())) return;
    // innermost match only, so wrappers around a contact block don't match on its behalf
    const nested = block.find(BLOCKS).filter((_, inner) => CONTACT_PATTERN.test($(inner).text()));
    if (!nested.length) sections.push(block.text());
  });

  const excerpt = sections.length ? sections.join(" ") : $.root().text().slice(0, FALLBACK_CHARS);
  return excerpt.trim();
}
