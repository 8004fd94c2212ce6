import { describe, it } from "mocha";
import { expect } from "chai";

import { InvalidSelectionError } from "../src/errors";
import { NETWORKS, matchesNetwork, networkMenu, parseNetworkChoice, selectNetwork } from "../src/networks";

describe("selectNetwork", () => {
  it("maps 1 to Facebook and 2 to Instagram", () => {
    expect(selectNetwork(1)).to.equal(NETWORKS.facebook);
    expect(selectNetwork(2)).to.equal(NETWORKS.instagram);
  });

  it("rejects any other choice", () => {
    for (const choice of [0, 3, -1, 1.5, Number.NaN]) {
      expect(() => selectNetwork(choice)).to.throw(InvalidSelectionError);
    }
  });

  it("parses prompt answers", () => {
    expect(parseNetworkChoice(" 2\n")).to.equal(NETWORKS.instagram);
    expect(() => parseNetworkChoice("facebook")).to.throw(InvalidSelectionError, 'Invalid choice "facebook"');
    expect(() => parseNetworkChoice("")).to.throw(InvalidSelectionError);
  });

  it("lists the menu in selection order", () => {
    expect(networkMenu()).to.equal("1 - Facebook\n2 - Instagram");
  });

  it("keeps profiles immutable", () => {
    expect(Object.isFrozen(NETWORKS.facebook)).to.equal(true);
    expect(Object.isFrozen(NETWORKS.facebook.validSubstrings)).to.equal(true);
  });
});

describe("matchesNetwork", () => {
  const facebook = NETWORKS.facebook;
  const instagram = NETWORKS.instagram;

  it("accepts post links under the network domain", () => {
    expect(matchesNetwork("https://www.facebook.com/posts/123", facebook)).to.equal(true);
    expect(matchesNetwork("https://www.facebook.com/groups/99/permalink/1", facebook)).to.equal(true);
    expect(matchesNetwork("https://www.instagram.com/reel/Cx1/", instagram)).to.equal(true);
  });

  it("rejects profile pages without a post path", () => {
    expect(matchesNetwork("https://www.facebook.com/johndoe", facebook)).to.equal(false);
  });

  it("rejects links on another host prefix", () => {
    expect(matchesNetwork("https://m.facebook.com/posts/123", facebook)).to.equal(false);
    expect(matchesNetwork("https://www.instagram.com/p/abc", facebook)).to.equal(false);
  });
});
