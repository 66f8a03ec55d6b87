import { collapseWhitespace, stripMarkup } from '../html';

describe('stripMarkup', () => {
  it('separates block elements and keeps inline text together', () => {
    expect(stripMarkup('<h2>Heading</h2><p>Hello <b>world</b>!</p><ul><li>One</li><li>Two</li></ul>'))
      .toBe('Heading Hello world! One Two');
  });

  it('decodes entities', () => {
    expect(stripMarkup('Fish &amp; chips &lt;3')).toBe('Fish & chips <3');
  });

  it('drops script and style content', () => {
    expect(stripMarkup('<style>p { color: red; }</style><p>Visible</p><script>alert(1)</script>'))
      .toBe('Visible');
  });

  it('returns an empty string for blank input', () => {
    expect(stripMarkup('   ')).toBe('');
  });
});

describe('collapseWhitespace', () => {
  it('collapses runs of whitespace and trims', () => {
    expect(collapseWhitespace('  a \n\t b  ')).toBe('a b');
  });
});
