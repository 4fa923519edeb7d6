import React from 'react';
import { describe, it, expect } from 'vitest';
import { renderToStaticMarkup } from 'react-dom/server';
import MarkdownPanel from './MarkdownPanel';

describe('MarkdownPanel', () => {
  it('renders the markdown under the title', () => {
    const html = renderToStaticMarkup(<MarkdownPanel title="Introduction" content="Hello **NAD**" accent="#00c0ef" />);
    expect(html).toContain('>Introduction</div>');
    expect(html).toContain('<strong>NAD</strong>');
    expect(html).not.toContain('<img');
  });

  it('shows the illustration beside the text when given one', () => {
    const html = renderToStaticMarkup(
      <MarkdownPanel
        title="Introduction"
        content="Hello"
        accent="#00c0ef"
        image={{ src: '/img/nad-rna.svg', alt: 'NAD-capped RNA' }}
      />
    );
    expect(html).toContain('<img src="/img/nad-rna.svg" alt="NAD-capped RNA" class="w-full max-w-xs rounded-lg"/>');
  });
});
