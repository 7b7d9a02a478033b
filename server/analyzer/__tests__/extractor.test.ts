import { describe, expect, it } from "@jest/globals";
import { classifyDoctype, extractPageFacts, parseHtml } from "../extractor";
import { SAMPLE_PAGE } from "../../__tests__/helpers/fixtures";

const BASE = new URL("http://site.test/docs/page");

function extract(html: string, base: URL = BASE) {
  return extractPageFacts(parseHtml(html), base);
}

describe("classifyDoctype", () => {
  it.each([
    ["html", "HTML5"],
    ["html 5", "HTML5"],
    ['html public "-//w3c//dtd html 4.01 transitional//en"', "HTML4.01"],
    ['html public "-//w3c//dtd xhtml 1.0 strict//en"', "XHTML1.0"],
    ['html public "-//w3c//dtd xhtml 1.1//en"', "XHTML1.1"],
    ["html public \"-//w3c//dtd html 3.2 final//en\"", "Unknown"],
  ])("classifies %s as %s", (doctype, expected) => {
    expect(classifyDoctype(doctype)).toBe(expected);
  });

  it("defaults to Unknown without a doctype", () => {
    expect(classifyDoctype(null)).toBe("Unknown");
  });
});

describe("extractPageFacts", () => {
  it("reads the html version from the doctype declaration", () => {
    expect(extract("<!DOCTYPE html><html></html>").htmlVersion).toBe("HTML5");
    expect(extract("<!DOCTYPE HTML 4.01 Transitional><html></html>").htmlVersion).toBe("HTML4.01");
    expect(
      extract('<!DOCTYPE html PUBLIC "-//W3C//DTD XHTML 1.1//EN" "http://www.w3.org/TR/xhtml11/DTD/xhtml11.dtd"><html></html>')
        .htmlVersion
    ).toBe("XHTML1.1");
    expect(extract("<html><body></body></html>").htmlVersion).toBe("Unknown");
  });

  it("extracts title, headings, links and forms from a typical page", () => {
    const facts = extract(SAMPLE_PAGE, new URL("http://site.test/"));

    expect(facts.title).toBe("Test Page");
    expect(facts.headings).toEqual({ h1: 1, h2: 2, h3: 1 });
    expect(facts.links).toEqual([
      { href: "/", resolvedUrl: "http://site.test/", isInternal: true },
      { href: "/about", resolvedUrl: "http://site.test/about", isInternal: true },
      { href: "https://external.test/", resolvedUrl: "https://external.test/", isInternal: false },
    ]);
    expect(facts.forms).toHaveLength(1);
    expect(facts.forms[0].attribs.action).toBe("/login");
  });

  it("counts only h1 to h6 as headings", () => {
    const facts = extract(`
      <header><hgroup><h1>One</h1><h6>Six</h6></hgroup></header>
      <hr><h7>not a heading</h7><h2>Two</h2>
    `);

    expect(facts.headings).toEqual({ h1: 1, h2: 1, h6: 1 });
  });

  it("takes the first title in document order", () => {
    const facts = extract("<html><head><title>First</title></head><body><title>Second</title></body></html>");
    expect(facts.title).toBe("First");
  });

  it("returns an empty title when the page has none", () => {
    expect(extract("<html><body><h1>x</h1></body></html>").title).toBe("");
  });

  it("skips empty, fragment and javascript hrefs", () => {
    const facts = extract(`
      <a href="">empty</a>
      <a href="#top">top</a>
      <a href="javascript:void(0)">js</a>
      <a>no href</a>
      <a href="next">next</a>
    `);

    expect(facts.links.map((link) => link.href)).toEqual(["next"]);
  });

  it("keeps the raw href and resolves it against the base URL", () => {
    const facts = extract('<a href="../guide?x=1#part">guide</a>');

    expect(facts.links).toEqual([
      { href: "../guide?x=1#part", resolvedUrl: "http://site.test/guide?x=1", isInternal: true },
    ]);
  });

  it("resolves links that differ only by fragment to the same url", () => {
    const facts = extract('<a href="/a#x">x</a><a href="/a#y">y</a>');

    expect(facts.links.map((link) => [link.href, link.resolvedUrl])).toEqual([
      ["/a#x", "http://site.test/a"],
      ["/a#y", "http://site.test/a"],
    ]);
  });

  it("drops hrefs that cannot be resolved", () => {
    const facts = extract('<a href="http://[broken">bad</a><a href="/ok">ok</a>');
    expect(facts.links.map((link) => link.href)).toEqual(["/ok"]);
  });

  it("classifies by host, including the port", () => {
    const facts = extract(
      `<a href="http://site.test/a">same</a>
       <a href="http://site.test:8080/b">other port</a>
       <a href="//cdn.site.test/c">subdomain</a>
       <a href="mailto:team@site.test">mail</a>`
    );

    expect(facts.links.map((link) => [link.href, link.isInternal])).toEqual([
      ["http://site.test/a", true],
      ["http://site.test:8080/b", false],
      ["//cdn.site.test/c", false],
      ["mailto:team@site.test", true],
    ]);
  });

  it("compares hosts exactly as written", () => {
    const facts = extract(
      `<a href="http://SITE.test/a">upper</a>
       <a href="http://site.test:80/b">default port</a>
       <a href="https://editor@site.test/c">userinfo</a>`
    );

    expect(facts.links.map((link) => [link.href, link.isInternal])).toEqual([
      ["http://SITE.test/a", false],
      ["http://site.test:80/b", false],
      ["https://editor@site.test/c", true],
    ]);
  });

  it("uses the page authority it is given", () => {
    const facts = extractPageFacts(
      parseHtml('<a href="http://site.test:80/a">a</a><a href="/b">b</a>'),
      new URL("http://site.test:80/"),
      "site.test:80"
    );

    expect(facts.links.map((link) => link.isInternal)).toEqual([true, true]);
  });

  it("handles deeply nested markup", () => {
    const depth = 10_000;
    const html = "<div>".repeat(depth) + '<a href="/deep">deep</a>' + "</div>".repeat(depth);

    const facts = extract(html);

    expect(facts.links).toEqual([{ href: "/deep", resolvedUrl: "http://site.test/deep", isInternal: true }]);
  });

  it("collects many sibling links in order", () => {
    const html = Array.from({ length: 20_000 }, (_, index) => `<a href="/p${index}">${index}</a>`).join("");

    const facts = extract(html);

    expect(facts.links).toHaveLength(20_000);
    expect(facts.links[19_999].href).toBe("/p19999");
  });

  it("keeps document order across nested subtrees", () => {
    const facts = extract(`
      <nav><ul><li><a href="/1">1</a></li><li><a href="/2">2</a></li></ul></nav>
      <main><section><div><a href="/3">3</a></div></section><a href="/4">4</a></main>
      <footer><a href="/5">5</a></footer>
    `);

    expect(facts.links.map((link) => link.href)).toEqual(["/1", "/2", "/3", "/4", "/5"]);
  });

  it("collects every form, nested or not", () => {
    const facts = extract(`
      <form id="search"><input type="search"></form>
      <div><div><form id="login"><input type="password"></form></div></div>
    `);

    expect(facts.forms.map((form) => form.attribs.id)).toEqual(["search", "login"]);
  });

  it("yields the same facts when run twice over one tree", () => {
    const document = parseHtml(SAMPLE_PAGE);
    const base = new URL("http://site.test/");

    expect(extractPageFacts(document, base)).toEqual(extractPageFacts(document, base));
  });

  it("returns defaults for an empty document", () => {
    expect(extract("")).toEqual({
      htmlVersion: "Unknown",
      title: "",
      headings: {},
      links: [],
      forms: [],
    });
  });
});
