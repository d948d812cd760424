import { afterEach, describe, expect, it, vi } from "vitest";
import { info, setLogLevel } from "./logger";
import { applyLogLevel, toAppList } from "./options";

afterEach(() => {
    setLogLevel("info");
    vi.restoreAllMocks();
});

describe("applyLogLevel()", () => {
    it("leaves the level alone when the option is absent", () => {
        const log = vi.spyOn(console, "log").mockImplementation(() => {});
        applyLogLevel({});
        info("shown");
        expect(log).toHaveBeenCalledOnce();
    });

    it("sets a known level", () => {
        const log = vi.spyOn(console, "log").mockImplementation(() => {});
        applyLogLevel({ logLevel: "error" });
        info("hidden");
        expect(log).not.toHaveBeenCalled();
    });

    it("exits on an unknown level", () => {
        vi.spyOn(console, "error").mockImplementation(() => {});
        vi.spyOn(process, "exit").mockImplementation((code) => {
            throw new Error(`exit ${code}`);
        });

        const log = vi.spyOn(console, "log").mockImplementation(() => {});

        expect(() => applyLogLevel({ logLevel: "loud" })).toThrow("exit 1");
        info("still shown");
        expect(log).toHaveBeenCalledOnce();
    });
});

describe("toAppList()", () => {
    it("passes undefined through", () => {
        expect(toAppList(undefined)).toBeUndefined();
    });

    it("wraps a single app", () => {
        expect(toAppList("billing")).toEqual(["billing"]);
    });

    it("keeps repeated apps", () => {
        expect(toAppList(["billing", "notifications"])).toEqual(["billing", "notifications"]);
    });
});
