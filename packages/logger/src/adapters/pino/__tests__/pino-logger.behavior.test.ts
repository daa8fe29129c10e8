import { PinoLogger } from "../pino-logger"
import { makeLineDestination } from "./pino-harness"

describe("PinoLogger behavior", () => {
  it("emits JSON to the provided destination", () => {
    const { lines, destination } = makeLineDestination()

    const logger = new PinoLogger({ level: "trace", destination }, { module: "registry" })

    logger.debug("convention registered", { convention: "uom" })

    expect(lines).toHaveLength(1)

    const payload = JSON.parse(lines[0] ?? "{}")

    expect(payload).toMatchObject({
      msg: "convention registered",
      module: "registry",
      convention: "uom",
      level: 20,
    })
    expect(typeof payload.time).toBe("number")
  })

  it("child() inherits the base logger sink and level", () => {
    const { lines, destination } = makeLineDestination()

    const base = new PinoLogger({ level: "warn", destination }, { module: "builder" })
    const child = base.child({ operation: "add_nested" })

    child.info("ignored")
    child.warn("logged")

    expect(lines).toHaveLength(1)
    expect(JSON.parse(lines[0] ?? "{}")).toMatchObject({
      msg: "logged",
      module: "builder",
      operation: "add_nested",
    })
  })

  it("serializes errors under err", () => {
    const { lines, destination } = makeLineDestination()

    const logger = new PinoLogger({ level: "info", destination })
    const err = new Error("outer", { cause: new Error("inner") })

    logger.error("decode failed", { err })

    const payload = JSON.parse(lines[0] ?? "{}")

    expect(payload.err.type).toBe("Error")
    expect(payload.err.stack).toContain("outer")
  })
})
