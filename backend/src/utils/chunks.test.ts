import { fromBuffer, readChunks } from "./chunks";

async function collect(source: AsyncIterable<Uint8Array | string>, size: number): Promise<string[]> {
  const out: string[] = [];
  for await (const chunk of readChunks(source, size)) out.push(chunk.toString("utf8"));
  return out;
}

async function* pieces(...items: string[]): AsyncGenerator<string> {
  for (const item of items) yield item;
}

describe("readChunks", () => {
  test("regroups uneven pieces into fixed-size chunks", async () => {
    expect(await collect(pieces("ab", "cdefg", "h", "ijk"), 4)).toEqual(["abcd", "efgh", "ijk"]);
  });

  test("exact multiple leaves no trailing chunk", async () => {
    expect(await collect(pieces("abcdef"), 3)).toEqual(["abc", "def"]);
  });

  test("empty source yields nothing", async () => {
    expect(await collect(pieces(), 3)).toEqual([]);
    expect(await collect(pieces("", ""), 3)).toEqual([]);
  });

  test("accepts byte arrays", async () => {
    const data = new Uint8Array(10).map((_, i) => 97 + i);
    expect(await collect(fromBuffer(data, 3), 4)).toEqual(["abcd", "efgh", "ij"]);
  });

  test("rejects non-positive sizes", async () => {
    await expect(collect(pieces("a"), 0)).rejects.toThrow("chunk size must be a positive integer");
  });

  test("propagates source errors", async () => {
    async function* broken(): AsyncGenerator<string> {
      yield "abc";
      throw new Error("disk gone");
    }
    await expect(collect(broken(), 2)).rejects.toThrow("disk gone");
  });
});
