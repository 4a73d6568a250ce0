/**
 * @webhook-relay/core - Text Overlay Tests
 */

import { describe, it, expect } from 'vitest';

import { buildTextSvg, escapeXml, renderTextOverlay, type TextStyle } from '../../watermark/text-overlay.js';

const style: TextStyle = {
  fontSize: 10,
  fillColor: '#FFFFFF',
  outlineColor: '#000000',
  outlineWidth: 0,
};

function countTextElements(svg: string): number {
  return svg.split('<text ').length - 1;
}

describe('escapeXml', () => {
  it('should escape markup characters', () => {
    expect(escapeXml(`<a href="x">Tom & Jerry's</a>`)).toBe(
      '&lt;a href=&quot;x&quot;&gt;Tom &amp; Jerry&apos;s&lt;/a&gt;',
    );
  });
});

describe('buildTextSvg', () => {
  it('should size the canvas from the glyph count', () => {
    const { svg, width, height } = buildTextSvg('Hi', style);

    expect(width).toBe(20);
    expect(height).toBe(21);
    expect(svg).toBe(
      '<svg xmlns="http://www.w3.org/2000/svg" width="20" height="21">' +
        '<text x="4" y="14" font-family="DejaVu Sans, Arial, sans-serif" font-size="10" ' +
        'font-weight="bold" fill="#FFFFFF">Hi</text>' +
        '</svg>',
    );
  });

  it('should draw eight outline copies before the fill', () => {
    const { svg, width, height } = buildTextSvg('Hi', { ...style, outlineWidth: 2 });

    expect(width).toBe(24);
    expect(height).toBe(25);
    expect(countTextElements(svg)).toBe(9);
    expect(svg).toContain('<text x="4" y="14" font-family');
    expect(svg.indexOf('fill="#000000"')).toBeLessThan(svg.indexOf('fill="#FFFFFF"'));
    expect(svg).toContain(
      '<text x="8" y="18" font-family="DejaVu Sans, Arial, sans-serif" font-size="10" ' +
        'font-weight="bold" fill="#000000">Hi</text>',
    );
    expect(svg.endsWith(
      '<text x="6" y="16" font-family="DejaVu Sans, Arial, sans-serif" font-size="10" ' +
        'font-weight="bold" fill="#FFFFFF">Hi</text></svg>',
    )).toBe(true);
  });

  it('should collapse whitespace and escape the text', () => {
    const { svg } = buildTextSvg('  a \n <b>  ', style);

    expect(svg).toContain('>a &lt;b&gt;</text>');
  });

  it('should use a custom font family', () => {
    const { svg } = buildTextSvg('x', { ...style, fontFamily: 'Mono' });

    expect(svg).toContain('font-family="Mono"');
  });
});

describe('renderTextOverlay', () => {
  it('should rasterize to an RGBA PNG of the SVG size', async () => {
    const asset = await renderTextOverlay('Hi', style);

    expect(asset.width).toBe(20);
    expect(asset.height).toBe(21);
    expect(asset.buffer.subarray(1, 4).toString('ascii')).toBe('PNG');
  });
});
