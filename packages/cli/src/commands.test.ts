import { expect } from "chai";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import sharp from "sharp";
import { silentLogger } from "idscan-core";
import type { ImageInput, OcrEngine, OcrLine } from "idscan-ocr";
import { runCli, type CliDeps, type CliIo } from "./commands.js";

interface Captured extends CliIo {
  stdout: string[];
  stderr: string[];
}

function capture(): Captured {
  const stdout: string[] = [];
  const stderr: string[] = [];
  return { stdout, stderr, out: line => stdout.push(line), err: line => stderr.push(line) };
}

class FixedEngine implements OcrEngine {
  constructor(private readonly lines: OcrLine[]) {}

  async recognize(_image: ImageInput): Promise<OcrLine[]> {
    return this.lines;
  }
}

const CARD_TEXT = "CALIFORNIA\nDRIVER LICENSE\nDL A1234567\n1 DOE\n2 JOHN\n3 01/15/1990\n";

describe("idscan cli", function () {
  let dir: string;
  const deps: CliDeps = { logger: silentLogger };

  before(function () {
    dir = mkdtempSync(join(tmpdir(), "idscan-cli-"));
  });

  after(function () {
    rmSync(dir, { recursive: true, force: true });
  });

  function textFile(name: string, content: string): string {
    const path = join(dir, name);
    writeFileSync(path, content, "utf8");
    return path;
  }

  describe("extract", function () {
    it("prints extracted fields", async function () {
      const io = capture();
      const code = await runCli(["extract", "--text", textFile("card.txt", CARD_TEXT)], io, deps);

      expect(code).to.equal(0);
      expect(io.stdout).to.deep.equal([
        "  Region:         CA (header)",
        "  Number:         A1234567 (validated)",
        "  Family name:    DOE",
        "  Given name:     JOHN",
        "  Date of birth:  1990-01-15",
        "  Confidence:     1.00",
      ]);
      expect(io.stderr).to.deep.equal([]);
    });

    it("prints JSON with --json and passes the region hint", async function () {
      const io = capture();
      const file = textFile("number.txt", "12345678\r\n");
      const code = await runCli(["extract", "--text", file, "--region", "TX", "--json"], io, deps);

      expect(code).to.equal(0);
      expect(JSON.parse(io.stdout.join("\n"))).to.deep.equal({
        documentNumber:  "12345678",
        region:          "TX",
        regionSource:    "hint",
        confidence:      0.5,
        numberValidated: true,
        warnings:        [],
      });
    });

    it("prints warnings and missing fields", async function () {
      const io = capture();
      await runCli(["extract", "--text", textFile("ambiguous.txt", "12345678\n")], io, deps);

      expect(io.stdout).to.deep.equal([
        "  Region:         PA (pattern, ambiguous)",
        "  Number:         12345678 (validated)",
        "  Family name:    not found",
        "  Given name:     not found",
        "  Date of birth:  not found",
        "  Confidence:     0.40",
        '  ! Number "12345678" fits PA, TX, VT; chose PA',
      ]);
    });

    it("fails on an empty file", async function () {
      const io = capture();
      const code = await runCli(["extract", "--text", textFile("empty.txt", "")], io, deps);

      expect(code).to.equal(1);
      expect(io.stderr).to.deep.equal(["Error [MALFORMED_INPUT]: Document has no lines"]);
    });

    it("fails on a missing file", async function () {
      const io = capture();
      const code = await runCli(["extract", "--text", join(dir, "nope.txt")], io, deps);

      expect(code).to.equal(1);
      expect(io.stderr).to.have.length(1);
      expect(io.stderr[0]).to.match(/^Error: ENOENT/);
    });

    it("prints usage without --text", async function () {
      const io = capture();
      expect(await runCli(["extract", "--text", "--json"], io, deps)).to.equal(1);
      expect(io.stderr).to.deep.equal(["Usage: idscan extract --text <file> [--region XX] [--json]"]);
    });
  });

  describe("scan", function () {
    let image: string;

    before(async function () {
      image = join(dir, "card.png");
      await sharp({ create: { width: 856, height: 540, channels: 3, background: { r: 250, g: 250, b: 250 } } })
        .png()
        .toFile(image);
    });

    it("runs OCR and extraction on an image", async function () {
      const io = capture();
      const engine = new FixedEngine([
        { text: "TEXAS", confidence: 0.9 },
        { text: "12345678", confidence: 0.8 },
      ]);
      const code = await runCli(["scan", "--image", image], io, { ...deps, engine });

      expect(code).to.equal(0);
      expect(io.stdout).to.deep.equal([
        "  Region:         TX (header)",
        "  Number:         12345678 (validated)",
        "  Family name:    not found",
        "  Given name:     not found",
        "  Date of birth:  not found",
        "  Confidence:     0.70",
        "  OCR lines:      2",
        "  OCR confidence: 0.85",
      ]);
    });

    it("reports OCR errors with their code", async function () {
      const io = capture();
      const notImage = textFile("not-image.png", "plain text");
      const code = await runCli(["scan", "--image", notImage], io, { ...deps, engine: new FixedEngine([]) });

      expect(code).to.equal(1);
      expect(io.stderr).to.have.length(1);
      expect(io.stderr[0]).to.match(/^Error \[INVALID_IMAGE\]: Error reading image: /);
    });

    it("prints usage without --image", async function () {
      const io = capture();
      expect(await runCli(["scan"], io, deps)).to.equal(1);
      expect(io.stderr).to.deep.equal(["Usage: idscan scan --image <file> [--region XX] [--json] [--verbose]"]);
    });
  });

  describe("regions and help", function () {
    it("lists every region with its number format", async function () {
      const io = capture();
      expect(await runCli(["regions"], io)).to.equal(0);

      expect(io.stdout).to.have.length(32);
      expect(io.stdout[0]).to.equal("  CODE  NAME            NUMBER FORMAT");
      expect(io.stdout).to.include("  CA    California      1 letter, 7 digits");
      expect(io.stdout).to.include("  NH    New Hampshire   2 digits, 3 letters, 5 digits");
      expect(io.stdout[31]).to.equal("30 regions");
    });

    it("prints help with no command", async function () {
      const io = capture();
      expect(await runCli([], io)).to.equal(0);
      expect(io.stdout.join("\n")).to.contain("COMMANDS:");
    });

    it("rejects unknown commands", async function () {
      const io = capture();
      expect(await runCli(["frobnicate"], io)).to.equal(1);
      expect(io.stderr).to.deep.equal(['Unknown command "frobnicate"']);
    });
  });
});
