import { escapeHtml, formatBotMessage } from '../../lib/supportChat/formatMessage';

describe('escapeHtml', () => {
  test('escapes markup characters', () => {
    expect(escapeHtml('<b>"Tom" & \'Ana\'</b>')).toBe('&lt;b&gt;&quot;Tom&quot; &amp; &#39;Ana&#39;&lt;/b&gt;');
  });
});

describe('formatBotMessage', () => {
  test('turns links into anchors that open in a new tab', () => {
    expect(formatBotMessage('Apply at https://example.edu/apply today'))
      .toBe('Apply at <a href="https://example.edu/apply" target="_blank" rel="noopener noreferrer">https://example.edu/apply</a> today');
  });

  test('keeps trailing punctuation outside the link', () => {
    expect(formatBotMessage('See http://example.edu/fees.'))
      .toBe('See <a href="http://example.edu/fees" target="_blank" rel="noopener noreferrer">http://example.edu/fees</a>.');
  });

  test('renders newlines as line breaks', () => {
    expect(formatBotMessage('Line one\nLine two\r\nLine three')).toBe('Line one<br>Line two<br>Line three');
  });

  test('never lets markup through', () => {
    expect(formatBotMessage('<img src=x onerror=alert(1)>')).toBe('&lt;img src=x onerror=alert(1)&gt;');
  });

  test('leaves text without links untouched', () => {
    expect(formatBotMessage('Office hours are 9 to 5')).toBe('Office hours are 9 to 5');
  });
});
