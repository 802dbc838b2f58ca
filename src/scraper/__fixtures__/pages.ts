/**
 * HTML builders for detik-style search and article pages
 */

export function searchResultsPage(hrefs: readonly string[]): string {
  const cards = hrefs
    .map(
      (href, index) => `
      <article class="list-content__item">
        <div class="media">
          <div class="media__image">
            <a href="${href}#thumb" class="media__link"><img src="/thumb-${index}.jpg" alt=""></a>
          </div>
          <div class="media__text">
            <h3 class="media__title"><a href="${href}" class="media__link">Artikel ${index + 1}</a></h3>
            <div class="media__date"><span>2 jam yang lalu</span></div>
            <a href="https://www.detik.com/penulis/${index}" class="media__author">Penulis</a>
          </div>
        </div>
      </article>`
    )
    .join('');

  return `<!DOCTYPE html>
<html><body>
  <div class="list-content">${cards}</div>
</body></html>`;
}

export function emptySearchPage(): string {
  return `<!DOCTYPE html>
<html><body>
  <div class="search-result-empty">Pencarian tidak ditemukan</div>
</body></html>`;
}

export interface ArticlePageOptions {
  title?: string | null;
  author?: string | null;
  category?: string | null;
  date?: string | null;
  paragraphs?: readonly string[];
  /** Raw body markup; overrides `paragraphs` */
  bodyHtml?: string;
  containerClass?: string;
}

export function articlePage(options: ArticlePageOptions = {}): string {
  const {
    title = 'Harga Beras Naik di Pasar Induk',
    author = 'Andi Saputra - detikFinance',
    category = 'detikFinance',
    date = 'Senin, 14 Okt 2024 10:30 WIB',
    paragraphs = [
      'Jakarta - Harga beras medium naik di Pasar Induk Cipinang.',
      'Pedagang menyebut pasokan dari daerah berkurang.',
    ],
    containerClass = 'detail__body-text',
  } = options;

  const body = options.bodyHtml ?? paragraphs.map((text) => `<p>${text}</p>`).join('\n');

  return `<!DOCTYPE html>
<html><body>
  ${category === null ? '' : `<div class="page__breadcrumb"><a href="/finance">${category}</a><a href="/finance/berita">Berita</a></div>`}
  <article class="detail">
    ${title === null ? '' : `<h1 class="detail__title">\n      ${title}\n    </h1>`}
    ${author === null ? '' : `<div class="detail__author">${author}</div>`}
    ${date === null ? '' : `<div class="detail__date">${date}</div>`}
    <div class="${containerClass}">
      ${body}
    </div>
  </article>
</body></html>`;
}
