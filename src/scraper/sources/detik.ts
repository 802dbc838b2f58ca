/**
 * detik.com
 *
 * Search results are requested with relevance sorting, which detik
 * returns newest first; the date-bound stop relies on that order.
 */

import { config } from '../../config/index.js';
import { parseIndonesianDate } from '../date-parser.js';
import { sourceIdFromUrl } from '../record.js';
import { selectText } from '../selectors.js';
import type { NewsSource } from '../types.js';

export function createDetikSource(baseUrl: string = config.sources.detik.baseUrl): NewsSource {
  const root = baseUrl.replace(/\/+$/, '');

  return {
    name: 'detik',
    id: sourceIdFromUrl(root),
    baseUrl: root,

    buildSearchUrl(keyword, page) {
      const params = new URLSearchParams({
        query: keyword,
        page: String(page),
        result_type: 'relevansi',
      });
      return `${root}/search/searchall?${params.toString()}`;
    },

    // Simplified single-page rendering of the article
    articleUrl(link) {
      const url = new URL(link);
      url.searchParams.set('single', '1');
      return url.toString();
    },

    links: {
      cardSelector: '.list-content__item',
      titleLinkSelector: 'h3.media__title a',
      excludePatterns: [
        'wolipop.detik.com',
        '/detiktv/',
        '/pop/',
        '20.detik.com',
        '/foto-',
        '-video',
      ],
    },

    fields: {
      category: [selectText('.page__breadcrumb a'), selectText('.breadcrumb a')],
      title: [selectText('.detail__title'), selectText('h1.detail__title'), selectText('h1')],
      author: [selectText('.detail__author'), selectText('.author')],
      date: [selectText('.detail__date'), selectText('.date'), selectText('time')],
    },

    content: {
      containerSelectors: ['.detail__body-text', '.itp_bodycontent', '.detail-content'],
      removeSelectors: [
        'script',
        'style',
        'iframe',
        'ins',
        'template',
        '.noncontent',
        '.linksisip',
        'table.linksisip',
        '.parallaxindetail',
        '.staticdetail_container',
        '.aevp',
        '.pip-vid',
        '[data-type="_mgwidget"]',
        '.eyeo',
        '.detail__body-tag',
        'div[id^="div-gpt-ad"]',
        'div[id^="mgw"]',
        'div[data-tf-live]',
      ],
      noiseClassMarkers: ['clearfix', 'ads-', 'mg_', 'mc', 'para_caption'],
      paragraphSelector: 'p, strong',
      boilerplate: ['ADVERTISEMENT', 'SCROLL TO CONTINUE WITH CONTENT'],
    },

    parseDate: parseIndonesianDate,
  };
}
