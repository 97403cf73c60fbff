import { describe, it } from "node:test";
import assert from "node:assert/strict";
import path from "node:path";
import fs from "fs-extra";
import { parseConfig, type SiteConfigInput } from "../config.js";
import { DocsError, LinkCheckError } from "../errors.js";
import http, { type ProbeResult } from "../http.js";
import { prepare } from "../prepare.js";
import { setupTempDirs, silenceConsole } from "../test-utils.js";
import { build, outputPathFor } from "./index.js";

const unreachable = (_url: string) =>
  Promise.resolve<ProbeResult>({ ok: false, reason: "ENOTFOUND" });

describe("outputPathFor", () => {
  it("swaps the markdown extension for html", () => {
    assert.equal(outputPathFor("index.md"), "index.html");
    assert.equal(outputPathFor("guide/style.md"), "guide/style.html");
  });
});

describe("build", () => {
  const { createTempDir } = setupTempDirs();
  silenceConsole();

  const setupSite = async (
    files: Record<string, string>,
    config: Partial<SiteConfigInput> = {}
  ) => {
    const dir = await createTempDir();
    for (const [file, content] of Object.entries(files)) {
      await fs.outputFile(path.join(dir, "src", file), content);
    }
    return {
      dir,
      config: parseConfig(
        { sitename: "Guide", pages: [["Guide", "index.md"]], ...config },
        { base: dir }
      ),
    };
  };

  it("renders a prepared page into the build directory", async () => {
    const dir = await createTempDir();
    await fs.outputFile(path.join(dir, "README.md"), "# Title\nHello");
    await prepare({
      source: path.join(dir, "README.md"),
      destination: path.join(dir, "src", "index.md"),
    });
    const config = parseConfig(
      { sitename: "Guide", pages: [["Guide", "index.md"]] },
      { base: dir }
    );

    const site = await build(config);

    assert.equal(site.root, path.join(dir, "build"));
    assert.equal(site.sitename, "Guide");
    assert.equal(site.pages.length, 1);
    const [page] = site.pages;
    assert.equal(page.title, "Guide");
    assert.equal(page.output, "index.html");
    assert.equal(page.source, path.join(dir, "src", "index.md"));
    assert.deepEqual(page.headings, ["title"]);
    assert.equal(page.body, '<h1 id="title">Title</h1>\n<p>Hello</p>');
    assert.equal(
      await fs.readFile(path.join(dir, "build", "index.html"), "utf8"),
      page.html
    );
  });

  it("points links between pages at the rendered html", async () => {
    const { dir, config } = await setupSite(
      {
        "index.md": "# Home\n\n[style](guide/style.md)",
        "guide/style.md": "# Style",
      },
      {
        pages: [
          ["Home", "index.md"],
          ["Style", "guide/style.md"],
        ],
      }
    );

    const site = await build(config);

    assert.equal(
      site.pages[0].body,
      '<h1 id="home">Home</h1>\n<p><a href="guide/style.html">style</a></p>'
    );
    assert.ok(
      await fs.pathExists(path.join(dir, "build", "guide", "style.html"))
    );
  });

  it("ships the files that pages link to, without the markdown", async () => {
    const { dir, config } = await setupSite({
      "index.md": "# Guide\n\n![diagram](img/diagram.png)",
      "img/diagram.png": "not really a png",
    });

    await build(config);

    assert.equal(
      await fs.readFile(path.join(dir, "build", "img", "diagram.png"), "utf8"),
      "not really a png"
    );
    assert.equal(
      await fs.pathExists(path.join(dir, "build", "index.md")),
      false
    );
  });

  describe("external links", () => {
    it("skips exempt urls", async (t) => {
      const probe = t.mock.method(http, "probe", unreachable);
      const { dir, config } = await setupSite(
        { "index.md": "[x](https://unreachable.test/)" },
        { linkCheck: true, linkCheckIgnore: ["https://unreachable.test/"] }
      );

      await build(config);

      assert.equal(probe.mock.callCount(), 0);
      assert.ok(await fs.pathExists(path.join(dir, "build", "index.html")));
    });

    it("fails on an unreachable url and writes nothing", async (t) => {
      t.mock.method(http, "probe", unreachable);
      const { dir, config } = await setupSite(
        { "index.md": "[x](https://unreachable.test/)" },
        { linkCheck: true }
      );

      await assert.rejects(build(config), (err) => {
        assert.ok(err instanceof LinkCheckError);
        assert.equal(err.type, "linkcheck");
        assert.deepEqual(err.failures, [
          {
            type: "linkcheck",
            url: "https://unreachable.test/",
            page: "index.md",
            reason: "ENOTFOUND",
          },
        ]);
        return true;
      });
      assert.equal(await fs.pathExists(path.join(dir, "build")), false);
    });
  });

  describe("cross references", () => {
    it("fail the build by default", async () => {
      const { config } = await setupSite({ "index.md": "[x](#missing)" });

      await assert.rejects(build(config), (err) => {
        assert.ok(err instanceof LinkCheckError);
        assert.equal(err.type, "cross_references");
        return true;
      });
    });

    it("only warn when listed in warnOnly", async () => {
      const { dir, config } = await setupSite(
        { "index.md": "[x](#missing)" },
        { warnOnly: ["cross_references"] }
      );

      await build(config);

      assert.ok(await fs.pathExists(path.join(dir, "build", "index.html")));
    });
  });

  describe("clean", () => {
    it("empties the build directory first", async () => {
      const { dir, config } = await setupSite({ "index.md": "# Guide" });
      await fs.outputFile(path.join(dir, "build", "stale.html"), "old");

      await build(config);

      assert.equal(
        await fs.pathExists(path.join(dir, "build", "stale.html")),
        false
      );
    });

    it("keeps earlier files when disabled", async () => {
      const { dir, config } = await setupSite(
        { "index.md": "# Guide" },
        { clean: false }
      );
      await fs.outputFile(path.join(dir, "build", "stale.html"), "old");

      await build(config);

      assert.ok(await fs.pathExists(path.join(dir, "build", "stale.html")));
    });
  });

  describe("assets", () => {
    it("copies them next to the pages", async () => {
      const { dir, config } = await setupSite(
        { "index.md": "# Guide", "assets/favicon.svg": "<svg/>" },
        { format: { assets: ["assets/favicon.svg"] } }
      );

      const site = await build(config);

      assert.deepEqual(site.assets, ["assets/favicon.svg"]);
      assert.equal(
        await fs.readFile(
          path.join(dir, "build", "assets", "favicon.svg"),
          "utf8"
        ),
        "<svg/>"
      );
      assert.ok(
        site.pages[0].html.includes(
          '<link rel="icon" href="assets/favicon.svg">'
        )
      );
    });

    it("fails on a missing asset", async () => {
      const { config } = await setupSite(
        { "index.md": "# Guide" },
        { format: { assets: ["assets/favicon.svg"] } }
      );

      await assert.rejects(build(config), (err) => {
        assert.ok(err instanceof DocsError);
        assert.equal(err.type, "missing_asset");
        return true;
      });
    });
  });

  it("keeps the previous build when an asset is missing", async () => {
    const { dir, config } = await setupSite(
      { "index.md": "# Guide" },
      { format: { assets: ["assets/favicon.svg"] } }
    );
    await fs.outputFile(path.join(dir, "build", "index.html"), "old");

    await assert.rejects(build(config), DocsError);

    assert.equal(
      await fs.readFile(path.join(dir, "build", "index.html"), "utf8"),
      "old"
    );
  });

  it("refuses an asset outside of the source directory", async () => {
    const { dir, config } = await setupSite(
      { "index.md": "# Guide" },
      { format: { assets: ["../logo.svg"] } }
    );
    await fs.outputFile(path.join(dir, "logo.svg"), "<svg/>");

    await assert.rejects(build(config), (err) => {
      assert.ok(err instanceof DocsError);
      assert.equal(err.type, "invalid_config");
      return true;
    });
  });

  describe("pages", () => {
    it("fails on a page that does not exist", async () => {
      const { config } = await setupSite({});

      await assert.rejects(build(config), (err) => {
        assert.ok(err instanceof DocsError);
        assert.equal(err.type, "missing_page");
        return true;
      });
    });

    it("refuses a page outside of the source directory", async () => {
      const { config } = await setupSite(
        { "index.md": "# Guide" },
        { pages: [["Readme", "../README.md"]] }
      );

      await assert.rejects(build(config), (err) => {
        assert.ok(err instanceof DocsError);
        assert.equal(err.type, "invalid_config");
        return true;
      });
    });
  });
});
