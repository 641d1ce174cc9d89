import { Config } from "../config"

describe("Config", () => {
  const data = { LOADER_MAX_BATCH_SIZE: 100, LOG_PRETTY: false, SERVICE_NAME: "pages" }
  const provenance = { LOADER_MAX_BATCH_SIZE: "env", SERVICE_NAME: "dotenv:.env" }
  const supplied = new Set(["LOADER_MAX_BATCH_SIZE", "SERVICE_NAME", "LOADER_MAX_BATCHSIZE"])

  const config = new Config(data, provenance, supplied)

  it("returns values by key with their types", () => {
    const size: number = config.get("LOADER_MAX_BATCH_SIZE")
    const pretty: boolean = config.get("LOG_PRETTY")

    expect(size).toBe(100)
    expect(pretty).toBe(false)
    expect(config.get("SERVICE_NAME")).toBe("pages")
  })

  it("lists schema keys only", () => {
    expect(config.keys()).toEqual(["LOADER_MAX_BATCH_SIZE", "LOG_PRETTY", "SERVICE_NAME"])
  })

  it("explains where a value came from", () => {
    expect(config.explain("LOADER_MAX_BATCH_SIZE")).toBe("env")
    expect(config.explain("SERVICE_NAME")).toBe("dotenv:.env")
    expect(config.explain("LOG_PRETTY")).toBe("default")
  })

  it("lists each contributing source once, with default when defaults applied", () => {
    expect(config.sourcesUsed()).toEqual(["env", "dotenv:.env", "default"])
  })

  it("omits default when every key was supplied", () => {
    const full = new Config({ A: "1" }, { A: "env" }, new Set(["A"]))

    expect(full.sourcesUsed()).toEqual(["env"])
  })

  it("reports supplied keys missing from the schema", () => {
    expect(config.extras()).toEqual(["LOADER_MAX_BATCHSIZE"])
    expect(new Config(data, provenance, new Set(["SERVICE_NAME"])).extras()).toEqual([])
  })

  it("freezes its value", () => {
    expect(Object.isFrozen(config.value)).toBe(true)
  })

  it("does not share the input object", () => {
    const input = { SERVICE_NAME: "pages" }
    const copy = new Config(input, {}, new Set())
    input.SERVICE_NAME = "changed"

    expect(copy.get("SERVICE_NAME")).toBe("pages")
  })
})
