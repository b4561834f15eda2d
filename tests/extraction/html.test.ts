import { expect, test } from '@playwright/test';
import {
  absoluteLinks,
  decodeEntities,
  documentTitle,
  findAllElements,
  findElement,
  getAttribute,
  hasClass,
  isOnDomain,
  nextSiblingElement,
  prepareMarkup,
  textOf,
} from '../../src/extraction';

test.describe('Markup helpers', () => {
  test('textOf should strip tags, decode entities and collapse whitespace', () => {
    expect(textOf('<p>Tom &amp; Jerry&nbsp;<b>Show</b></p>')).toBe('Tom & Jerry Show');
    expect(textOf('<div>\n  one\n\n  two </div>')).toBe('one two');
  });

  test('decodeEntities should decode &amp; last', () => {
    expect(decodeEntities('&amp;lt;')).toBe('&lt;');
    expect(decodeEntities('&#8211; &#x2014;')).toBe('– —');
  });

  test('prepareMarkup should hide comments, scripts and styles', () => {
    const html = '<p>a</p><!-- <h2>Candidates</h2> --><script>var x = "<ul>";</script><style>p{}</style>';
    expect(textOf(prepareMarkup(html))).toBe('a');
  });

  test('list items should end at the next item or at the end of the list', () => {
    const items = findAllElements('<ul><li>a<li>b</ul><p>after</p>', ['li']);
    expect(items.map((item) => item.inner)).toEqual(['a', 'b']);
  });

  test('findElement should balance nested tags of the same name', () => {
    const html = '<div id="a"><div>inner</div>tail</div><div id="b"></div>';
    const element = findElement(html, ['div']);

    expect(element?.inner).toBe('<div>inner</div>tail');
    expect(getAttribute(element?.attrs ?? '', 'id')).toBe('a');
    expect(element?.end).toBe(html.indexOf('<div id="b">'));
  });

  test('findElement should treat void elements as empty', () => {
    const html = '<p>one<br>two</p>';
    expect(findElement(html, ['br'])?.inner).toBe('');
    expect(findElement(html, ['p'])?.inner).toBe('one<br>two');
  });

  test('findElement should return null when nothing matches', () => {
    expect(findElement('<p>text</p>', ['table'])).toBeNull();
    expect(findElement('<p>text</p>', [])).toBeNull();
  });

  test('findAllElements should return outermost matches unless nested is set', () => {
    const html = '<ul><li>a<ul><li>b</li></ul></li></ul><ul><li>c</li></ul>';
    expect(findAllElements(html, ['ul'])).toHaveLength(2);
    expect(findAllElements(html, ['ul'], { nested: true })).toHaveLength(3);
    expect(findAllElements(html, ['ul'], { nested: true, limit: 2 })).toHaveLength(2);
  });

  test('getAttribute and hasClass should read quoted and bare values', () => {
    expect(getAttribute(` href='https://a.example/?x=1&amp;y=2'`, 'href')).toBe('https://a.example/?x=1&y=2');
    expect(getAttribute(' data-id=42 ', 'data-id')).toBe('42');
    expect(getAttribute(' class="x"', 'id')).toBeUndefined();
    expect(hasClass(' class="wikitable infobox vevent"', 'infobox')).toBe(true);
    expect(hasClass(' class="infoboxes"', 'infobox')).toBe(false);
  });

  test('nextSiblingElement should skip closing tags and span decorations', () => {
    const html =
      '<div><h2>Candidates<span class="edit">[edit]</span></h2></div>\n<span>x</span><ul><li>A</li></ul>';
    const heading = findElement(html, ['h2']);
    const sibling = nextSiblingElement(html, heading?.end ?? 0);

    expect(sibling?.tag).toBe('ul');
    expect(sibling?.inner).toBe('<li>A</li>');
  });

  test('nextSiblingElement should return null when text comes first', () => {
    const html = '<h2>Candidates</h2> To be announced <ul><li>A</li></ul>';
    const heading = findElement(html, ['h2']);
    expect(nextSiblingElement(html, heading?.end ?? 0)).toBeNull();
  });

  test('documentTitle should read the title element', () => {
    expect(documentTitle('<html><head><title> Race - Ballotpedia </title></head></html>')).toBe(
      'Race - Ballotpedia'
    );
    expect(documentTitle('<html><head></head></html>')).toBeUndefined();
  });

  test('absoluteLinks should keep only http(s) hrefs', () => {
    const html =
      '<a href="/wiki/A">A</a><a href="https://x.example/">X</a><a href=\'http://y.example\'>Y</a><a href="mailto:a@example.com">M</a>';
    expect(absoluteLinks(html)).toEqual(['https://x.example/', 'http://y.example']);
  });

  test('isOnDomain should match the domain and its subdomains only', () => {
    expect(isOnDomain('https://en.wikipedia.org/wiki/X', 'wikipedia.org')).toBe(true);
    expect(isOnDomain('https://wikipedia.org/', 'wikipedia.org')).toBe(true);
    expect(isOnDomain('https://notwikipedia.org/', 'wikipedia.org')).toBe(false);
    expect(isOnDomain('not a url', 'wikipedia.org')).toBe(false);
  });
});
