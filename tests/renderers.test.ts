import { describe, it, expect, vi, afterEach } from 'vitest';
import { SafeHTML } from '../src/core/safe-html.js';
import { SVG_NS, XLINK_NS } from '../src/core/symbols.js';
import { Journal } from '../src/renderers/journal.js';
import { VirtualRenderer, createVirtualRenderer } from '../src/renderers/virtual.js';

describe('VirtualRenderer', () => {
  describe('names', () => {
    it('rejects invalid tag names like the DOM does', () => {
      const renderer = new VirtualRenderer();
      expect(() => renderer.createElement('bad tag', null)).toThrow('The tag name "bad tag" is not a valid name.');
      expect(() => renderer.createElement('', null)).toThrow(DOMException);
    });

    it('rejects invalid attribute names', () => {
      const renderer = new VirtualRenderer();
      const node = renderer.createElement('div', null);
      expect(() => renderer.setAttribute(node, 'a"b', 'x')).toThrow('The attribute name "a"b" is not a valid name.');
      expect(node.attributes.size).toBe(0);
    });

    it('accepts namespaced and custom element names', () => {
      const renderer = new VirtualRenderer();
      const node = renderer.createElement('my-widget', null);
      renderer.setAttributeNS(node, XLINK_NS, 'xlink:href', '#a');
      renderer.setAttribute(node, 'data-x.y', '1');

      expect(renderer.getAttributeNS(node, XLINK_NS, 'href')).toBe('#a');
      expect(renderer.getAttribute(node, 'data-x.y')).toBe('1');
    });
  });

  describe('tree operations', () => {
    it('moves a node that already has a parent', () => {
      const renderer = new VirtualRenderer();
      const a = renderer.createElement('a', null);
      const b = renderer.createElement('b', null);
      const child = renderer.createTextNode('x');
      renderer.appendChild(a, child);

      renderer.appendChild(b, child);

      expect(a.childNodes).toEqual([]);
      expect(b.childNodes).toEqual([child]);
      expect(child.parentNode).toBe(b);
    });

    it('refuses to insert a node into its own subtree', () => {
      const renderer = new VirtualRenderer();
      const outer = renderer.createElement('div', null);
      const inner = renderer.createElement('span', null);
      renderer.appendChild(outer, inner);

      expect(() => renderer.appendChild(inner, outer)).toThrow('The new child cannot be inserted here.');
    });

    it('refuses a reference node that belongs elsewhere', () => {
      const renderer = new VirtualRenderer();
      const parent = renderer.createElement('div', null);
      const stranger = renderer.createTextNode('s');

      expect(() => renderer.insertBefore(parent, renderer.createTextNode('x'), stranger))
        .toThrow('The reference node is not a child of this node.');
    });

    it('replaces a node in place', () => {
      const renderer = new VirtualRenderer();
      const parent = renderer.createElement('ul', null);
      const [a, b, c] = ['a', 'b', 'c'].map((label) => renderer.createTextNode(label));
      for (const node of [a, b, c]) renderer.appendChild(parent, node);
      const d = renderer.createTextNode('d');

      renderer.replaceWith(b, d);

      expect(parent.childNodes).toEqual([a, d, c]);
      expect(b.parentNode).toBeNull();
      expect(renderer.nextSibling(d)).toBe(c);
    });

    it('replaces element children with setTextContent', () => {
      const renderer = new VirtualRenderer();
      const node = renderer.createElement('p', null);
      renderer.appendChild(node, renderer.createElement('b', null));

      renderer.setTextContent(node, 'plain');

      expect(renderer.serialize(node)).toBe('<p>plain</p>');
    });
  });

  describe('events', () => {
    it('bubbles to ancestors until propagation stops', () => {
      const renderer = new VirtualRenderer();
      const outer = renderer.createElement('div', null);
      const middle = renderer.createElement('section', null);
      const inner = renderer.createElement('button', null);
      renderer.appendChild(outer, middle);
      renderer.appendChild(middle, inner);

      const seen: string[] = [];
      renderer.addEventListener(inner, 'click', () => seen.push('inner'));
      renderer.addEventListener(middle, 'click', (event) => {
        seen.push('middle');
        event.stopPropagation();
      });
      renderer.addEventListener(outer, 'click', () => seen.push('outer'));

      const event = renderer.dispatchEvent(inner, 'click', { x: 1 });

      expect(seen).toEqual(['inner', 'middle']);
      expect(event.target).toBe(inner);
      expect(event.currentTarget).toBe(middle);
      expect(event.detail).toEqual({ x: 1 });
    });

    it('forgets an event name once its last listener is gone', () => {
      const renderer = new VirtualRenderer();
      const node = renderer.createElement('div', null);
      const handler = vi.fn();

      renderer.addEventListener(node, 'click', handler);
      renderer.addEventListener(node, 'click', handler);
      expect(node.listeners.get('click')).toEqual([handler]);

      renderer.removeEventListener(node, 'click', handler);
      expect(node.listeners.has('click')).toBe(false);
    });
  });

  describe('output', () => {
    afterEach(() => {
      SafeHTML.resetSanitizer();
    });

    it('serializes escaped HTML', () => {
      const renderer = new VirtualRenderer();
      const div = renderer.createElement('div', null);
      renderer.setAttribute(div, 'title', 'a "quote"');
      renderer.setStyle(div, 'color', 'red');
      renderer.setStyle(div, 'margin-top', '1px');
      renderer.appendChild(div, renderer.createTextNode('1 < 2 & 3'));
      renderer.appendChild(div, renderer.createElement('br', null));

      expect(renderer.serialize(div)).toBe(
        '<div title="a &quot;quote&quot;" style="color: red; margin-top: 1px">1 &lt; 2 &amp; 3<br /></div>'
      );
    });

    it('emits innerHTML only when it is SafeHTML', () => {
      vi.spyOn(console, 'warn').mockImplementation(() => {});
      const renderer = new VirtualRenderer();
      const trusted = renderer.createElement('div', null);
      const untrusted = renderer.createElement('div', null);
      renderer.setProperty(trusted, 'innerHTML', SafeHTML.unsafe('<b>bold</b>'));
      renderer.setProperty(untrusted, 'innerHTML', '<b>bold</b>');

      expect(renderer.serialize(trusted)).toBe('<div><b>bold</b></div>');
      expect(renderer.serialize(untrusted)).toBe('<div>&lt;b&gt;bold&lt;/b&gt;</div>');
    });

    it('snapshots nodes as sorted plain data', () => {
      const renderer = createVirtualRenderer();
      const svg = renderer.createElement('svg', SVG_NS);
      renderer.setAttribute(svg, 'width', '10');
      renderer.setAttribute(svg, 'height', '5');
      renderer.setAttributeNS(svg, XLINK_NS, 'xlink:href', '#a');
      renderer.setProperty(svg, 'zIndex', 2);
      renderer.addEventListener(svg, 'focus', () => {});
      renderer.addEventListener(svg, 'blur', () => {});
      renderer.appendChild(svg, renderer.createTextNode('t'));

      expect(renderer.toJSON(svg)).toEqual({
        type: 'element',
        tag: 'svg',
        namespace: SVG_NS,
        attributes: { height: '5', width: '10', [`{${XLINK_NS}}xlink:href`]: '#a' },
        props: { zIndex: 2 },
        style: {},
        listeners: ['blur', 'focus'],
        children: [{ type: 'text', value: 't' }]
      });
    });

    it('logs host calls in debug mode', () => {
      const log = vi.spyOn(console, 'log').mockImplementation(() => {});
      const renderer = new VirtualRenderer({ debug: true });

      renderer.createElement('div', null);

      expect(log).toHaveBeenCalledWith('[VirtualRenderer] createElement:', 'div', '');
    });

    it('starts over after reset()', () => {
      const renderer = new VirtualRenderer();
      renderer.appendChild(renderer.getRoot(), renderer.createTextNode('x'));

      renderer.reset();

      expect(renderer.serialize()).toBe('<body></body>');
    });
  });
});

describe('Journal', () => {
  it('rolls back every journaled change, newest first', () => {
    const renderer = new VirtualRenderer();
    const parent = renderer.createElement('ul', null);
    const first = renderer.createElement('li', null);
    const second = renderer.createElement('li', null);
    renderer.appendChild(parent, first);
    renderer.appendChild(parent, second);
    renderer.setAttribute(first, 'class', 'a');
    renderer.setProperty(first, 'value', 1);
    renderer.setStyle(second, 'color', 'red');
    const before = renderer.toJSON(parent);

    const journal = new Journal(renderer);
    const host = journal.host;
    host.setAttribute(first, 'class', 'b');
    host.setAttribute(first, 'id', 'new');
    host.removeProperty(first, 'value');
    host.setProperty(second, 'checked', true);
    host.removeStyle(second, 'color');
    host.insertBefore(parent, second, first);
    host.removeChild(first);
    host.appendChild(parent, renderer.createTextNode('added'));
    host.addEventListener(second, 'click', () => {});

    expect(journal.size).toBe(9);
    journal.rollback();

    expect(renderer.toJSON(parent)).toEqual(before);
    expect(parent.childNodes).toEqual([first, second]);
    expect(journal.size).toBe(0);
  });

  it('restores a replaced node', () => {
    const renderer = new VirtualRenderer();
    const parent = renderer.createElement('div', null);
    const old = renderer.createTextNode('old');
    renderer.appendChild(parent, old);
    const next = renderer.createElement('p', null);

    const journal = new Journal(renderer);
    journal.host.replaceWith(old, next);
    expect(parent.childNodes).toEqual([next]);

    journal.rollback();
    expect(parent.childNodes).toEqual([old]);
    expect(next.parentNode).toBeNull();
  });

  it('forgets its steps on commit', () => {
    const renderer = new VirtualRenderer();
    const node = renderer.createElement('div', null);
    const journal = new Journal(renderer);

    journal.host.setAttribute(node, 'id', 'kept');
    journal.commit();
    journal.rollback();

    expect(renderer.getAttribute(node, 'id')).toBe('kept');
  });

  it('runs every undo step and reports the ones that fail', () => {
    const renderer = new VirtualRenderer();
    const node = renderer.createElement('div', null);
    const journal = new Journal(renderer);
    const failure = new Error('cannot undo');

    journal.host.setAttribute(node, 'id', 'x');
    journal.record(() => { throw failure; });

    expect(() => journal.rollback()).toThrow('treepatch: rollback could not restore the live tree');
    expect(renderer.getAttribute(node, 'id')).toBeNull();
  });
});

describe('SafeHTML', () => {
  afterEach(() => {
    SafeHTML.resetSanitizer();
  });

  it('requires a configured sanitizer', () => {
    expect(SafeHTML.hasSanitizer()).toBe(false);
    expect(() => SafeHTML.sanitize('<b>x</b>')).toThrow(TypeError);
  });

  it('wraps sanitized output', () => {
    SafeHTML.configureSanitizer({ sanitize: (html) => html.replace(/<script>.*<\/script>/g, '') });

    const safe = SafeHTML.sanitize('<b>x</b><script>alert(1)</script>');

    expect(SafeHTML.isSafeHTML(safe)).toBe(true);
    expect(safe.toString()).toBe('<b>x</b>');
    expect(JSON.stringify({ safe })).toBe('{"safe":"<b>x</b>"}');
  });

  it('does not accept look-alike objects', () => {
    expect(SafeHTML.isSafeHTML({ toString: () => '<b>x</b>' })).toBe(false);
    expect(SafeHTML.isSafeHTML(SafeHTML.empty())).toBe(true);
  });

  it('warns about unsafe() in development', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    SafeHTML.unsafe('<i>trusted</i>');
    expect(warn).toHaveBeenCalledTimes(1);
  });
});
