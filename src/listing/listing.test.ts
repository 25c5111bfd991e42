import { describe, expect, test } from "vitest";
import { createTestContext, registryXml, TEST_XKB_ROOT } from "#/test-utils/mocks";
import { listAll, listRegistered } from "./listing";
import { matchesMask, parseMask } from "./mask";

const EVDEV_PATH = `${TEST_XKB_ROOT}/rules/evdev.xml`;
const FR_SYMBOLS = `${TEST_XKB_ROOT}/symbols/fr`;

const BEPO_BLOCK = "// KALAMINE::BEPO::BEGIN\nxkb_symbols \"bepo\" {};\n// KALAMINE::BEPO::END\n";

function createListingContext() {
  return createTestContext({
    [EVDEV_PATH]: registryXml({
      fr: { azerty: "French (AZERTY)", bepo: "French (Bépo)", ergol: "French (Ergo-L)" },
      us: { colemak: "English (Colemak)" },
    }),
    [FR_SYMBOLS]: `// system layouts\n\n${BEPO_BLOCK}`,
  });
}

describe("mask", () => {
  describe("parseMask", () => {
    test("matches everything for an empty mask or a wildcard", () => {
      expect(parseMask("")).toEqual({ locale: "*", variant: "*" });
      expect(parseMask("*")).toEqual({ locale: "*", variant: "*" });
      expect(parseMask()).toEqual({ locale: "*", variant: "*" });
    });

    test("parses locale and locale/variant masks", () => {
      expect(parseMask("fr")).toEqual({ locale: "fr", variant: "*" });
      expect(parseMask("fr/ergol")).toEqual({ locale: "fr", variant: "ergol" });
      expect(parseMask("*/ergol")).toEqual({ locale: "*", variant: "ergol" });
      expect(parseMask("/ergol")).toEqual({ locale: "", variant: "ergol" });
    });
  });

  describe("matchesMask", () => {
    test("compares each segment exactly unless it is a wildcard", () => {
      expect(matchesMask(parseMask("fr/ergol"), "fr", "ergol")).toBe(true);
      expect(matchesMask(parseMask("fr/ergol"), "fr", "Ergol")).toBe(false);
      expect(matchesMask(parseMask("*/ergol"), "ch", "ergol")).toBe(true);
      expect(matchesMask(parseMask("fr"), "us", "ergol")).toBe(false);
      expect(matchesMask(parseMask("/ergol"), "fr", "ergol")).toBe(false);
      expect(matchesMask(parseMask("fr/"), "fr", "ergol")).toBe(false);
    });
  });
});

describe("listing", () => {
  describe("listAll", () => {
    test("returns one variant for a locale/variant mask", () => {
      const { ctx } = createListingContext();

      expect(listAll(ctx, "fr/azerty")).toEqual(new Map([["fr", new Map([["azerty", "French (AZERTY)"]])]]));
    });

    test("returns every variant of a locale", () => {
      const { ctx } = createListingContext();

      const listing = listAll(ctx, "fr");

      expect([...listing.keys()]).toEqual(["fr"]);
      expect([...(listing.get("fr")?.keys() ?? [])]).toEqual(["azerty", "bepo", "ergol"]);
    });

    test("returns everything for an empty mask", () => {
      const { ctx } = createListingContext();

      const listing = listAll(ctx, "");

      expect([...listing.keys()]).toEqual(["fr", "us"]);
      expect(listing.get("us")?.get("colemak")).toBe("English (Colemak)");
    });

    test("returns an empty listing when nothing matches", () => {
      const { ctx } = createListingContext();

      expect(listAll(ctx, "de").size).toBe(0);
    });
  });

  describe("listRegistered", () => {
    test("keeps only declared variants that have a symbols block", () => {
      const { ctx } = createListingContext();

      expect(listRegistered(ctx)).toEqual(new Map([["fr", new Map([["bepo", "French (Bépo)"]])]]));
    });

    test("excludes declared-but-missing layouts that listAll still reports", () => {
      const { ctx } = createListingContext();

      expect(listRegistered(ctx, "fr/ergol").size).toBe(0);
      expect(listAll(ctx, "fr/ergol").get("fr")?.get("ergol")).toBe("French (Ergo-L)");
    });

    test("drops locales without a symbols file", () => {
      const { ctx } = createListingContext();

      expect(listRegistered(ctx, "us").size).toBe(0);
    });

    test("matches marker names regardless of case", () => {
      const { ctx } = createTestContext({
        [EVDEV_PATH]: registryXml({ fr: { Bepo: "French (Bépo)" } }),
        [FR_SYMBOLS]: BEPO_BLOCK,
      });

      expect(listRegistered(ctx).get("fr")?.get("Bepo")).toBe("French (Bépo)");
    });

    test("sorts locales", () => {
      const { ctx } = createTestContext({
        [EVDEV_PATH]: registryXml({ us: { colemak: "English (Colemak)" }, fr: { bepo: "French (Bépo)" } }),
        [FR_SYMBOLS]: BEPO_BLOCK,
        [`${TEST_XKB_ROOT}/symbols/us`]: "// KALAMINE::COLEMAK::BEGIN\n// KALAMINE::COLEMAK::END\n",
      });

      expect([...listRegistered(ctx).keys()]).toEqual(["fr", "us"]);
    });
  });
});
