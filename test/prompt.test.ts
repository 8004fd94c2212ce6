import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { describe, it } from "mocha";
import { expect } from "chai";
import sinon from "sinon";

import { InvalidSelectionError } from "../src/errors";
import { NETWORKS } from "../src/networks";
import { askFileName, askNetwork, listFiles } from "../src/prompt";
import { RecordingLogger } from "./helpers/recordingLogger";
import { rejectionOf } from "./helpers/assertions";

function scripted(...answers: string[]) {
  const ask = sinon.stub<[string], Promise<string>>();
  answers.forEach((answer, i) => ask.onCall(i).resolves(answer));
  return ask;
}

describe("askNetwork", () => {
  it("shows the menu and returns the chosen profile", async () => {
    const ask = scripted("2");

    expect(await askNetwork(ask)).to.equal(NETWORKS.instagram);
    expect(ask.firstCall.args[0]).to.equal("Choose the social network:\n1 - Facebook\n2 - Instagram\n");
  });

  it("fails on an invalid choice", async () => {
    const err = await rejectionOf(askNetwork(scripted("3")));

    expect(err).to.be.instanceOf(InvalidSelectionError);
  });
});

describe("askFileName", () => {
  const files = ["april.csv", "march.csv"];

  it("lists files on '?' and accepts a 1-based index", async () => {
    const logger = new RecordingLogger();

    const file = await askFileName(scripted("?", "2"), files, logger);

    expect(file).to.equal("march.csv");
    expect(logger.messages("info")).to.deep.equal(["1. april.csv", "2. march.csv"]);
  });

  it("accepts an exact name", async () => {
    expect(await askFileName(scripted("april.csv"), files, new RecordingLogger())).to.equal("april.csv");
  });

  it("asks again after an invalid answer", async () => {
    const logger = new RecordingLogger();
    const ask = scripted("0", "may.csv", "1");

    const file = await askFileName(ask, files, logger);

    expect(file).to.equal("april.csv");
    expect(ask.callCount).to.equal(3);
    expect(logger.messages("warn")).to.deep.equal([
      "Invalid file name. Please try again.",
      "Invalid file name. Please try again.",
    ]);
  });
});

describe("listFiles", () => {
  it("returns visible regular files only", async () => {
    const dir = await mkdtemp(join(tmpdir(), "caption-url-finder-"));
    try {
      await writeFile(join(dir, "b.csv"), "");
      await writeFile(join(dir, "a.txt"), "");
      await writeFile(join(dir, ".env"), "");
      await mkdir(join(dir, "exports"));

      expect(await listFiles(dir)).to.deep.equal(["a.txt", "b.csv"]);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});
