import { Readability } from '@mozilla/readability';
import { CheerioAPI, load } from 'cheerio';
import { JSDOM, VirtualConsole } from 'jsdom';

import {
  EncyclopediaPayload,
  ForumPayload,
  GenericPayload,
  KeySection,
  PagePayload,
  PageType,
  ProductPayload,
  VideoPayload
} from '../types.js';
import { logger } from '../utils/logger.js';
import { cleanText, normalizeWhitespace, truncate } from '../utils/text.js';
import { getDomain } from '../utils/url.js';

export interface ContentExtractorOptions {
  minContentLength?: number;
}

export interface ParsedPage {
  $: CheerioAPI;
  url: string;
  title: string;
  generic: GenericPayload;
}

export interface ReadableText {
  title: string;
  text: string;
}

export interface Extraction {
  title: string;
  payload: PagePayload;
}

const MAIN_CONTENT_LIMIT = 1_500;
const SECTION_LIMIT = 300;

const CONTENT_SELECTORS = [
  'article',
  'main',
  '.content',
  '.post-content',
  '.entry-content',
  '.article-content',
  '#content',
  '.main-content',
  '.page-content',
  '.site-content'
];

const NOISE_SELECTORS = 'nav, footer, aside, .nav, .footer, .sidebar, .menu, .header, .advertisement, .ads';
const FALLBACK_BLOCK_SELECTORS = 'p, li, div.description, div.summary, .info, .details';
const SKIP_WORDS = ['cookie', 'privacy', 'terms', 'subscribe', 'newsletter', 'login', 'register'];

const DETAIL_PATTERNS: Array<{ label: string; pattern: RegExp }> = [
  { label: 'price', pattern: /(?:price|cost|₹|rs\.?|usd|\$)\s*:?\s*([0-9,]+(?:\.[0-9]+)?)/i },
  { label: 'mileage', pattern: /(?:mileage|efficiency|mpg|kmpl)\s*:?\s*([0-9]+(?:\.[0-9]+)?)/i },
  { label: 'power', pattern: /(?:power|hp|bhp|kw)\s*:?\s*([0-9]+(?:\.[0-9]+)?)/i },
  { label: 'engine', pattern: /(?:engine|displacement|cc)\s*:?\s*([0-9]+(?:\.[0-9]+)?)/i },
  { label: 'weight', pattern: /(?:weight|mass|kg|pounds)\s*:?\s*([0-9]+(?:\.[0-9]+)?)/i },
  { label: 'features', pattern: /(?:features?|specifications?|specs?)\s*:?\s*([a-zA-Z0-9\s,.-]+)/i }
];

const PAGE_TYPE_RULES: Array<{ kind: Exclude<PageType, 'generic'>; domains: string[] }> = [
  { kind: 'product', domains: ['amazon.', 'ebay.', 'bestbuy.com', 'flipkart.com'] },
  { kind: 'forum', domains: ['reddit.com', 'stackoverflow.com', 'stackexchange.com', 'github.com', 'quora.com'] },
  { kind: 'encyclopedia', domains: ['wikipedia.org', 'britannica.com'] },
  { kind: 'video', domains: ['youtube.com', 'vimeo.com'] }
];

const IMPORTANT_SPECS = ['brand', 'model', 'color', 'size', 'weight', 'material', 'dimensions'];

const log = logger.child('extractor');

export function detectPageType(url: string): PageType {
  const domain = getDomain(url) ?? '';
  const rule = PAGE_TYPE_RULES.find(({ domains }) => domains.some((entry) => domain.includes(entry)));
  return rule?.kind ?? 'generic';
}

/** First non-empty value among the selectors; `content` wins over text (meta tags). */
function firstValue($: CheerioAPI, selectors: string[]): string {
  for (const selector of selectors) {
    const element = $(selector).first();
    if (element.length === 0) continue;
    const value = cleanText(element.attr('content') ?? element.text());
    if (value) {
      return value;
    }
  }
  return '';
}

export class ContentExtractor {
  private minContentLength: number;

  constructor(options: ContentExtractorOptions = {}) {
    this.minContentLength = options.minContentLength ?? 100;
  }

  /** Direct-tier parse. Never throws, whatever the markup looks like. */
  parse(html: string, url: string): ParsedPage {
    const $ = load(html);
    $('script, style, noscript, template, svg').remove();

    const title =
      cleanText($('title').first().text()) ||
      cleanText($('meta[property="og:title"]').attr('content')) ||
      cleanText($('h1').first().text());

    const summary = cleanText(
      $('meta[name="description"]').attr('content') ?? $('meta[property="og:description"]').attr('content')
    );

    const mainContent = this.extractMainContent($);
    const keySections = this.extractKeySections($);
    const importantDetails = this.extractImportantDetails($, mainContent, keySections);

    return {
      $,
      url,
      title,
      generic: { kind: 'generic', summary, mainContent, keySections, importantDetails }
    };
  }

  isUsable(page: ParsedPage): boolean {
    return page.generic.mainContent.length >= this.minContentLength || page.generic.keySections.length > 0;
  }

  /** The looser bar applied to rendered pages: anything identifiable at all. */
  hasAnyContent(page: ParsedPage): boolean {
    return page.title.length > 0 || page.generic.mainContent.length > 0;
  }

  /** Extracted-tier parse: Mozilla Readability over a jsdom document. */
  readable(html: string, url: string): ReadableText | null {
    let dom: JSDOM | null = null;
    try {
      dom = new JSDOM(html, { url, virtualConsole: new VirtualConsole() });
      const article = new Readability(dom.window.document).parse();
      const text = normalizeWhitespace(article?.textContent ?? '');
      if (!text) {
        return null;
      }
      return { title: cleanText(article?.title), text };
    } catch (error) {
      log.debug(`Readability failed for ${url}`, error);
      return null;
    } finally {
      dom?.window.close();
    }
  }

  /**
   * Applies the domain overlay for the page type. Overlays only add fields;
   * whether the page counts as scraped was decided before this is called.
   */
  refine(page: ParsedPage, readable?: ReadableText | null): Extraction {
    const generic: GenericPayload = readable
      ? { ...page.generic, mainContent: truncate(readable.text, MAIN_CONTENT_LIMIT) }
      : page.generic;
    const title = page.title || readable?.title || '';

    switch (detectPageType(page.url)) {
      case 'product':
        return this.refineProduct(page.$, title, generic);
      case 'forum':
        return this.refineForum(page.$, title, generic);
      case 'encyclopedia':
        return this.refineEncyclopedia(page.$, title, generic);
      case 'video':
        return this.refineVideo(page.$, title, generic);
      default:
        return { title, payload: generic };
    }
  }

  private extractMainContent($: CheerioAPI): string {
    for (const selector of CONTENT_SELECTORS) {
      const text = cleanText($(selector).first().text());
      if (text.length > 100) {
        return truncate(text, MAIN_CONTENT_LIMIT);
      }
    }

    $(NOISE_SELECTORS).remove();
    const blocks: string[] = [];
    $(FALLBACK_BLOCK_SELECTORS).each((_, element) => {
      const text = cleanText($(element).text());
      const lower = text.toLowerCase();
      if (text.length > 20 && !SKIP_WORDS.some((word) => lower.includes(word))) {
        blocks.push(text);
      }
    });
    return truncate(blocks.join(' '), MAIN_CONTENT_LIMIT);
  }

  private extractKeySections($: CheerioAPI): KeySection[] {
    const sections: KeySection[] = [];
    $('h1, h2, h3')
      .slice(0, 6)
      .each((_, heading) => {
        const headingText = cleanText($(heading).text());
        if (headingText.length <= 3) return;

        const parts: string[] = [];
        let current = $(heading).next();
        while (current.length > 0 && !current.is('h1, h2, h3') && parts.length < 3) {
          if (current.is('p, div, ul, ol')) {
            const text = cleanText(current.text());
            if (text.length > 20) {
              parts.push(text);
            }
          }
          current = current.next();
        }

        if (parts.length > 0) {
          sections.push({ heading: headingText, content: truncate(parts.join(' '), SECTION_LIMIT) });
        }
      });
    return sections;
  }

  private extractImportantDetails($: CheerioAPI, mainContent: string, sections: KeySection[]): string[] {
    const details: string[] = [];
    const fullText = [mainContent, ...sections.map((section) => section.content)].join(' ');

    for (const { label, pattern } of DETAIL_PATTERNS) {
      const match = pattern.exec(fullText);
      if (match?.[1]) {
        details.push(`${label}: ${truncate(match[1].trim(), 100)}`);
      }
    }

    if (mainContent.length < 200) {
      const rows: string[] = [];
      $('table')
        .slice(0, 2)
        .each((_, table) => {
          $(table)
            .find('tr')
            .slice(0, 5)
            .each((__, row) => {
              const cells = $(row)
                .find('td, th')
                .map((___, cell) => cleanText($(cell).text()))
                .get();
              const rowText = cells.join(' | ');
              if (cells.length >= 2 && rowText.length > 10) {
                rows.push(rowText);
              }
            });
        });
      details.push(...rows.slice(0, 10));
    }

    return details;
  }

  private refineProduct($: CheerioAPI, title: string, generic: GenericPayload): Extraction {
    const specs: Record<string, string> = {};
    $('#productDetails_techSpec_section_1 tr, #productDetails_detailBullets_sections1 tr').each((_, row) => {
      const name = cleanText($(row).find('th').first().text());
      const value = cleanText($(row).find('td').first().text());
      if (name && value && IMPORTANT_SPECS.some((spec) => name.toLowerCase().includes(spec))) {
        specs[name] = value;
      }
    });

    const keyFeatures = $('#feature-bullets ul li span')
      .slice(0, 5)
      .map((_, element) => cleanText($(element).text()))
      .get()
      .filter((feature) => feature.length > 0);

    const description = firstValue($, ['#productDescription', '[itemprop="description"]']) || generic.summary;
    const price = firstValue($, [
      '.a-price .a-offscreen',
      '.a-price-whole',
      '#priceblock_dealprice',
      '#priceblock_ourprice',
      '[itemprop="price"]',
      'meta[property="product:price:amount"]'
    ]);
    const rating = firstValue($, ['[data-hook="average-star-rating"] .a-icon-alt', '[itemprop="ratingValue"]']);

    const payload: ProductPayload = {
      kind: 'product',
      keyFeatures,
      specs,
      ...(price ? { price } : {}),
      ...(rating ? { rating } : {}),
      ...(description ? { description: truncate(description, 500) } : {})
    };

    return { title: firstValue($, ['#productTitle']) || title, payload };
  }

  private refineForum($: CheerioAPI, title: string, generic: GenericPayload): Extraction {
    const question =
      firstValue($, ['.s-prose', '.post-text', '[data-testid="post-content"] div', '.usertext-body', '.markdown-body']) ||
      generic.mainContent;

    let topAnswers: string[] = [];
    for (const selector of ['.answer .s-prose', '.answer .post-text', '.comment-body', '.reply .usertext-body']) {
      const answers = $(selector)
        .slice(0, 2)
        .map((_, element) => truncate(cleanText($(element).text()), 400))
        .get()
        .filter((answer) => answer.length > 0);
      if (answers.length > 0) {
        topAnswers = answers;
        break;
      }
    }

    const tags = Array.from(
      new Set(
        $('.post-tag, a[rel="tag"]')
          .map((_, element) => cleanText($(element).text()))
          .get()
          .filter((tag) => tag.length > 0)
      )
    ).slice(0, 5);

    const payload: ForumPayload = { kind: 'forum', question: truncate(question, 800), topAnswers, tags };
    return { title: firstValue($, ['h1', '.title', '[data-testid="post-content"] h1']) || title, payload };
  }

  private refineEncyclopedia($: CheerioAPI, title: string, generic: GenericPayload): Extraction {
    const firstParagraph = $('p')
      .map((_, element) => cleanText($(element).text()))
      .get()
      .find((text) => text.length > 20);

    const keySections = $('h2')
      .map((_, element) => cleanText($(element).text()))
      .get()
      .filter((heading) => {
        const lower = heading.toLowerCase();
        return heading.length > 0 && !['contents', 'reference', 'external', 'see also'].some((skip) => lower.includes(skip));
      })
      .slice(0, 3);

    const payload: EncyclopediaPayload = {
      kind: 'encyclopedia',
      summary: truncate(firstParagraph ?? generic.summary, 600),
      keySections
    };
    return { title: firstValue($, ['#firstHeading', 'h1']) || title, payload };
  }

  private refineVideo($: CheerioAPI, title: string, generic: GenericPayload): Extraction {
    const description = firstValue($, ['.description', '#description', '.content']) || generic.summary;
    const duration = firstValue($, ['meta[itemprop="duration"]']);
    const views = firstValue($, ['meta[itemprop="interactionCount"]', 'meta[itemprop="userInteractionCount"]']);
    const payload: VideoPayload = {
      kind: 'video',
      description: truncate(description, 300),
      ...(duration ? { duration } : {}),
      ...(views ? { views } : {})
    };
    return { title: firstValue($, ['meta[name="title"]', 'h1', '.title']) || title, payload };
  }
}

