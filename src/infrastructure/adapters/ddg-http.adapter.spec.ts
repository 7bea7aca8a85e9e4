import { parseDuckDuckGoResults } from './ddg-http.adapter';

describe('parseDuckDuckGoResults', () => {
  it('decodifica redirects, omite anuncios y links relativos', () => {
    const html = `
      <div class="result results_links result--ad">
        <a class="result__a" href="https://ads.example.com">Ad</a>
      </div>
      <div class="result results_links">
        <h2><a class="result__a" href="//duckduckgo.com/l/?uddg=https%3A%2F%2Facme.in%2F&rut=abc">Acme Tools - Home</a></h2>
        <a class="result__snippet">Precision   tools</a>
      </div>
      <div class="result">
        <a class="result__a" href="https://www.justdial.com/Pune/Acme">Acme on JustDial</a>
      </div>
      <div class="result">
        <a class="result__a" href="/relative">Relative</a>
      </div>`;

    expect(parseDuckDuckGoResults(html)).toEqual([
      { url: 'https://acme.in/', title: 'Acme Tools - Home', snippet: 'Precision tools' },
      { url: 'https://www.justdial.com/Pune/Acme', title: 'Acme on JustDial', snippet: '' },
    ]);
  });

  it('sin resultados devuelve lista vacía', () => {
    expect(parseDuckDuckGoResults('<div class="no-results">No results.</div>')).toEqual([]);
  });
});
