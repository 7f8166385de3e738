import { KeyedLock } from "../keyedLock";

function tick(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe("KeyedLock", () => {
  it("runs sections for one key one at a time in call order", async () => {
    const lock = new KeyedLock();
    const events: string[] = [];
    const section = (name: string, ms: number) =>
      lock.run("job", async () => {
        events.push(`${name}:start`);
        await tick(ms);
        events.push(`${name}:end`);
        return name;
      });

    const results = await Promise.all([section("a", 15), section("b", 1), section("c", 1)]);

    expect(results).toEqual(["a", "b", "c"]);
    expect(events).toEqual(["a:start", "a:end", "b:start", "b:end", "c:start", "c:end"]);
  });

  it("lets different keys overlap", async () => {
    const lock = new KeyedLock();
    const events: string[] = [];

    await Promise.all([
      lock.run("one", async () => {
        events.push("one:start");
        await tick(15);
        events.push("one:end");
      }),
      lock.run("two", async () => {
        events.push("two:start");
        events.push("two:end");
      }),
    ]);

    expect(events).toEqual(["one:start", "two:start", "two:end", "one:end"]);
  });

  it("releases the key when a section throws", async () => {
    const lock = new KeyedLock();

    await expect(
      lock.run("job", async () => {
        throw new Error("boom");
      })
    ).rejects.toThrow("boom");
    await expect(lock.run("job", async () => "next")).resolves.toBe("next");
  });
});
