import readline from "readline";
import { PassThrough } from "stream";
import { InputClosedError, askMenu, createPrompt, isDoneAnswer, parseScore, parseWholeNumber } from "./helpers";

describe("cli helpers", () => {
  describe("parseWholeNumber", () => {
    it("parses whole numbers with surrounding spaces", () => {
      expect(parseWholeNumber(" 12 ")).toBe(12);
      expect(parseWholeNumber("+3")).toBe(3);
    });

    it("returns null for anything else", () => {
      expect(parseWholeNumber("")).toBeNull();
      expect(parseWholeNumber("abc")).toBeNull();
      expect(parseWholeNumber("1.5")).toBeNull();
      expect(parseWholeNumber("7x")).toBeNull();
    });
  });

  describe("parseScore", () => {
    it("parses decimal scores", () => {
      expect(parseScore("95")).toBe(95);
      expect(parseScore(" 62.5 ")).toBe(62.5);
    });

    it("keeps out-of-range numbers for the range check", () => {
      expect(parseScore("150")).toBe(150);
      expect(parseScore("-4")).toBe(-4);
    });

    it("returns null for blank or non-numeric input", () => {
      expect(parseScore("")).toBeNull();
      expect(parseScore("   ")).toBeNull();
      expect(parseScore("ninety")).toBeNull();
    });
  });

  describe("isDoneAnswer", () => {
    it("recognises the end-of-subjects answers", () => {
      expect(isDoneAnswer("done")).toBe(true);
      expect(isDoneAnswer("D")).toBe(true);
      expect(isDoneAnswer("")).toBe(true);
      expect(isDoneAnswer("Math")).toBe(false);
    });
  });

  describe("askMenu", () => {
    beforeEach(() => {
      jest.spyOn(console, "log").mockImplementation(() => {});
    });

    afterEach(() => {
      jest.restoreAllMocks();
    });

    it("re-asks until a valid option is chosen", async () => {
      const ask = jest.fn<Promise<string>, [string]>()
        .mockResolvedValueOnce("9")
        .mockResolvedValueOnce("x")
        .mockResolvedValueOnce("2");

      const choice = await askMenu(ask, "Menu", ["One", "Two", "Three"]);

      expect(choice).toBe(2);
      expect(ask).toHaveBeenCalledTimes(3);
      expect(console.log).toHaveBeenCalledWith("2) Two");
      expect(console.log).toHaveBeenCalledWith("❌ Invalid choice. Enter 1-3.");
    });
  });

  describe("createPrompt", () => {
    const createInterface = () => {
      const input = new PassThrough();
      const rl = readline.createInterface({ input, output: new PassThrough() });
      return { input, rl };
    };

    it("resolves with the typed answer", async () => {
      const { input, rl } = createInterface();
      const ask = createPrompt(rl);

      const answer = ask("Name? ");
      input.write("Ada\n");

      await expect(answer).resolves.toBe("Ada");
      rl.close();
    });

    it("rejects a pending question when input closes", async () => {
      const { rl } = createInterface();
      const ask = createPrompt(rl);

      const answer = ask("Name? ");
      rl.close();

      await expect(answer).rejects.toBeInstanceOf(InputClosedError);
    });

    it("rejects new questions after close", async () => {
      const { rl } = createInterface();
      const ask = createPrompt(rl);
      rl.close();

      await expect(ask("Name? ")).rejects.toBeInstanceOf(InputClosedError);
    });
  });
});
