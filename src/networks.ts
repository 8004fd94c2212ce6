import { InvalidSelectionError } from "./errors";

export type NetworkKey = "facebook" | "instagram";

export type NetworkProfile = {
  readonly key: NetworkKey;
  readonly label: string;
  readonly domainUrl: string;
  readonly validSubstrings: readonly string[];
  readonly textColumn: string;
  readonly urlColumn: string;
  readonly siteQuery: string;
};

export const NETWORKS: Readonly<Record<NetworkKey, NetworkProfile>> = Object.freeze({
  facebook: Object.freeze({
    key: "facebook",
    label: "Facebook",
    domainUrl: "https://www.facebook.com/",
    validSubstrings: Object.freeze(["posts/", "videos/", "photos/", "groups/"]),
    textColumn: "Caption",
    urlColumn: "URL",
    siteQuery: "site: facebook.com",
  }),
  instagram: Object.freeze({
    key: "instagram",
    label: "Instagram",
    domainUrl: "https://www.instagram.com/",
    validSubstrings: Object.freeze(["p/", "tv/", "reel/", "video/", "photo/"]),
    textColumn: "Caption",
    urlColumn: "URL",
    siteQuery: "site: instagram.com",
  }),
});

// menu order: 1 - Facebook, 2 - Instagram
const MENU: readonly NetworkKey[] = ["facebook", "instagram"];

export function networkMenu(): string {
  return MENU.map((key, i) => `${i + 1} - ${NETWORKS[key].label}`).join("\n");
}

export function selectNetwork(choice: number): NetworkProfile {
  const key = Number.isInteger(choice) ? MENU[choice - 1] : undefined;
  if (!key) {
    throw new InvalidSelectionError(`Invalid choice "${choice}". Pick 1 (Facebook) or 2 (Instagram).`);
  }
  return NETWORKS[key];
}

export function parseNetworkChoice(input: string): NetworkProfile {
  const trimmed = input.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new InvalidSelectionError(`Invalid choice "${trimmed}". Pick 1 (Facebook) or 2 (Instagram).`);
  }
  return selectNetwork(Number(trimmed));
}

/** A link is accepted when it sits under the network's domain and points at a post-like path. */
export function matchesNetwork(link: string, network: NetworkProfile): boolean {
  return link.includes(network.domainUrl) && network.validSubstrings.some((s) => link.includes(s));
}
