import { bytes, keys } from "../../tests/utils/cache-test-helpers"
import type { Cache } from "../cache"

type CreateCache = () => Cache<Uint8Array, Uint8Array>

export function describeCacheContract(adapterName: string, createCache: CreateCache): void {
  describe(`Cache Contract Tests - ${adapterName}`, () => {
    let cache: Cache<Uint8Array, Uint8Array>

    beforeEach(() => {
      cache = createCache()
    })

    describe("get/put", () => {
      it("returns miss when key is absent", async () => {
        expect(await cache.get(keys.one())).toStrictEqual({ kind: "miss" })
      })

      it("returns hit with the bytes that were put", async () => {
        await cache.put(keys.one(), bytes.a())

        expect(await cache.get(keys.one())).toStrictEqual({ kind: "hit", value: bytes.a() })
      })

      it("put overwrites an existing entry", async () => {
        await cache.put(keys.one(), bytes.a())
        await cache.put(keys.one(), bytes.b())

        expect(await cache.get(keys.one())).toStrictEqual({ kind: "hit", value: bytes.b() })
      })

      it("stores an empty value as a hit", async () => {
        await cache.put(keys.one(), bytes.empty())

        expect(await cache.get(keys.one())).toStrictEqual({ kind: "hit", value: bytes.empty() })
      })

      it("put does not mutate the input Uint8Array", async () => {
        const value = bytes.a()

        await cache.put(keys.one(), value)

        expect(value).toStrictEqual(bytes.a())
      })
    })

    describe("evict", () => {
      it("removes an existing entry", async () => {
        await cache.put(keys.one(), bytes.a())
        await cache.evict(keys.one())

        expect(await cache.get(keys.one())).toStrictEqual({ kind: "miss" })
      })

      it("is idempotent", async () => {
        await cache.put(keys.one(), bytes.a())

        await cache.evict(keys.one())
        await cache.evict(keys.one())
        await cache.evict(keys.two())

        expect(await cache.get(keys.one())).toStrictEqual({ kind: "miss" })
      })

      it("leaves other keys alone", async () => {
        await cache.put(keys.one(), bytes.a())
        await cache.put(keys.two(), bytes.b())

        await cache.evict(keys.one())

        expect(await cache.get(keys.two())).toStrictEqual({ kind: "hit", value: bytes.b() })
      })
    })

    describe("clear", () => {
      it("removes every entry", async () => {
        await cache.put(keys.one(), bytes.a())
        await cache.put(keys.two(), bytes.b())

        await cache.clear()

        expect(await cache.get(keys.one())).toStrictEqual({ kind: "miss" })
        expect(await cache.get(keys.two())).toStrictEqual({ kind: "miss" })
      })

      it("on an empty cache is a no-op", async () => {
        await cache.clear()

        expect(await cache.get(keys.one())).toStrictEqual({ kind: "miss" })
      })

      it("leaves the cache usable", async () => {
        await cache.put(keys.one(), bytes.a())
        await cache.clear()
        await cache.put(keys.one(), bytes.c())

        expect(await cache.get(keys.one())).toStrictEqual({ kind: "hit", value: bytes.c() })
      })
    })

    describe("putIfAbsent", () => {
      it("stores the value when absent and reports a miss", async () => {
        expect(await cache.putIfAbsent(keys.one(), bytes.a())).toStrictEqual({ kind: "miss" })
        expect(await cache.get(keys.one())).toStrictEqual({ kind: "hit", value: bytes.a() })
      })

      it("keeps the existing value and returns it", async () => {
        await cache.put(keys.one(), bytes.a())

        expect(await cache.putIfAbsent(keys.one(), bytes.b())).toStrictEqual({
          kind: "hit",
          value: bytes.a(),
        })
        expect(await cache.get(keys.one())).toStrictEqual({ kind: "hit", value: bytes.a() })
      })

      it("entries written by putIfAbsent are removed by clear", async () => {
        await cache.putIfAbsent(keys.one(), bytes.a())

        await cache.clear()

        expect(await cache.get(keys.one())).toStrictEqual({ kind: "miss" })
      })
    })

    describe("getThrough", () => {
      it("returns the cached value without calling the loader", async () => {
        const loader = vi.fn(async () => bytes.b())
        await cache.put(keys.one(), bytes.a())

        expect(await cache.getThrough(keys.one(), loader)).toStrictEqual(bytes.a())
        expect(loader).not.toHaveBeenCalled()
      })

      it("loads, stores and returns on a miss", async () => {
        const loader = vi.fn(async () => bytes.b())

        expect(await cache.getThrough(keys.one(), loader)).toStrictEqual(bytes.b())
        expect(loader).toHaveBeenCalledTimes(1)
        expect(await cache.get(keys.one())).toStrictEqual({ kind: "hit", value: bytes.b() })
      })

      it("wraps a loader failure and stores nothing", async () => {
        const failure = new Error("source down")

        await expect(
          cache.getThrough(keys.one(), async () => {
            throw failure
          }),
        ).rejects.toMatchObject({ code: "value_retrieval_failed", cause: failure })

        expect(await cache.get(keys.one())).toStrictEqual({ kind: "miss" })
      })
    })
  })
}
