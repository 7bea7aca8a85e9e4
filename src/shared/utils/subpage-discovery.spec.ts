import { discoverSubpages, resolveLink } from './subpage-discovery';

describe('resolveLink', () => {
  it('resuelve rutas relativas y quita el fragmento', () => {
    expect(resolveLink('/contact#form', 'https://acme.in')).toBe('https://acme.in/contact');
    expect(resolveLink('about.html', 'https://acme.in/home/')).toBe('https://acme.in/home/about.html');
  });

  it('ignora esquemas que no son http(s)', () => {
    expect(resolveLink('mailto:info@acme.in', 'https://acme.in')).toBeNull();
    expect(resolveLink('javascript:void(0)', 'https://acme.in')).toBeNull();
  });
});

describe('discoverSubpages', () => {
  it('encuentra about y contacto por texto o href', () => {
    const html = `
      <nav>
        <a href="/">Home</a>
        <a href="/about-us">About Us</a>
        <a href="mailto:info@acme.in">Mail</a>
        <a href="/contact#form">Write to us</a>
      </nav>`;

    expect(discoverSubpages(html, 'https://acme.in')).toEqual({
      aboutUrl: 'https://acme.in/about-us',
      contactUrl: 'https://acme.in/contact',
    });
  });

  it('un link no resoluble no bloquea al siguiente', () => {
    const html = `
      <a href="javascript:void(0)">Contact</a>
      <a href="reach-us.html">Reach us</a>`;

    expect(discoverSubpages(html, 'https://acme.in/home/')).toEqual({
      aboutUrl: null,
      contactUrl: 'https://acme.in/home/reach-us.html',
    });
  });

  it('sin links devuelve ambos en null', () => {
    expect(discoverSubpages('<p>Nada</p>', 'https://acme.in')).toEqual({
      aboutUrl: null,
      contactUrl: null,
    });
  });
});
