import { describe, expect, it } from "vitest";
import { cleanText } from "../cleanText";

describe("cleanText", () => {
    it("collapses horizontal whitespace and keeps paragraph breaks", () => {
        expect(cleanText("Hello,   world!\n\n\n\nNext  para\nline two.  ")).toBe("Hello, world!\n\nNext para line two.");
    });

    it("joins lines broken by a single newline", () => {
        expect(cleanText("first\r\nsecond\rthird")).toBe("first second third");
    });

    it("strips characters outside the allowed set but keeps accented letters", () => {
        expect(cleanText("Café • naïve résumé!")).toBe("Café naïve résumé!");
        expect(cleanText("Cost: $5 (approx.); see [1]")).toBe("Cost: 5 (approx.); see 1");
    });

    it("keeps page markers intact", () => {
        expect(cleanText("--- Page 2 ---\n\nBody text")).toBe("--- Page 2 ---\n\nBody text");
    });

    it("returns an empty string for whitespace-only input", () => {
        expect(cleanText(" \n\t\n ")).toBe("");
    });
});
