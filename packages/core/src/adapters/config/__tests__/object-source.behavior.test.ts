import { ObjectSource } from "../object-source"

describe("ObjectSource behavior", () => {
  it("uses a default name", () => {
    expect(new ObjectSource({}).name).toBe("object:overrides")
  })

  it("accepts a custom name", () => {
    expect(new ObjectSource({}, "object:cli").name).toBe("object:cli")
  })

  it("keeps typed values", () => {
    expect(new ObjectSource({ LOG_PRETTY: true }).load()).toEqual({ LOG_PRETTY: true })
  })
})
