import type { ConfigSource } from "../config-source"

export type ConfigSourceHarness = {
  name: string
  make: () => ConfigSource
  expectedValue: () => Record<string, unknown>
}

export function describeConfigSourceContract(h: ConfigSourceHarness) {
  describe(`${h.name} (ConfigSource contract)`, () => {
    let source: ConfigSource

    beforeEach(() => {
      source = h.make()
    })

    it("has a name", () => {
      expect(typeof source.name).toBe("string")
      expect(source.name.length).toBeGreaterThan(0)
    })

    it("load() returns a plain object", () => {
      const result = source.load()

      expect(Array.isArray(result)).toBe(false)
      expect(Object.getPrototypeOf(result)).toBe(Object.prototype)
    })

    it("load() is idempotent", () => {
      expect(source.load()).toEqual(source.load())
    })

    it("load() does not leak a mutable reference", () => {
      const first = source.load()
      first.__CONFIG_TEST_MUTATION__ = "x"

      expect(source.load()).not.toHaveProperty("__CONFIG_TEST_MUTATION__")
    })

    it("load() returns expected values", () => {
      expect(source.load()).toMatchObject(h.expectedValue())
    })
  })
}
