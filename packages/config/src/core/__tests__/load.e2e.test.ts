import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { isAppError } from "@prism/errors"
import { z } from "zod"
import { z as zm } from "zod/mini"
import { DotenvSource } from "../../adapters/dotenv/dotenv-source"
import { EnvSource } from "../../adapters/env/env-source"
import { ObjectSource } from "../../adapters/object/object-source"
import { ConfigError } from "../config-error"
import { loadConfig } from "../load"

describe("loadConfig e2e", () => {
  let cwd: string

  const schema = z.object({
    LOADER_SCHEDULER: z.enum(["microtask", "interval"]).default("microtask"),
    LOADER_MAX_BATCH_SIZE: z.coerce.number().int().positive().optional(),
    SERVICE_NAME: z.string().default("prism"),
  })

  beforeEach(async () => {
    cwd = await fs.mkdtemp(path.join(os.tmpdir(), "config-e2e-"))
  })

  afterEach(async () => {
    await fs.rm(cwd, { recursive: true, force: true })
  })

  it("coerces values from a single env source", async () => {
    const config = await loadConfig({
      schema,
      sources: [new EnvSource({ env: { LOADER_MAX_BATCH_SIZE: "50" } })],
    })

    expect(config.get("LOADER_MAX_BATCH_SIZE")).toBe(50)
    expect(config.get("LOADER_SCHEDULER")).toBe("microtask")
    expect(config.explain("LOADER_SCHEDULER")).toBe("default")
  })

  it("lets later sources win and records provenance", async () => {
    await fs.writeFile(
      path.join(cwd, ".env"),
      "LOADER_SCHEDULER=interval\nSERVICE_NAME=from-file\n",
    )

    const config = await loadConfig({
      schema,
      sources: [
        new DotenvSource({ file: ".env", required: true, cwd }),
        new EnvSource({ env: { SERVICE_NAME: "from-env" } }),
        new ObjectSource({ LOADER_MAX_BATCH_SIZE: 10 }),
      ],
    })

    expect(config.value).toEqual({
      LOADER_SCHEDULER: "interval",
      LOADER_MAX_BATCH_SIZE: 10,
      SERVICE_NAME: "from-env",
    })
    expect(config.explain("LOADER_SCHEDULER")).toBe("dotenv:.env")
    expect(config.explain("SERVICE_NAME")).toBe("env")
    expect(config.explain("LOADER_MAX_BATCH_SIZE")).toBe("object:overrides")
  })

  it("does not let an undefined value override an earlier source", async () => {
    const config = await loadConfig({
      schema,
      sources: [
        new ObjectSource({ SERVICE_NAME: "kept" }, "base"),
        new EnvSource({ env: { SERVICE_NAME: undefined } }),
      ],
    })

    expect(config.get("SERVICE_NAME")).toBe("kept")
    expect(config.explain("SERVICE_NAME")).toBe("object:base")
  })

  it("reports keys outside the schema as extras", async () => {
    const config = await loadConfig({
      schema,
      sources: [new EnvSource({ env: { LOADER_MAX_BATCHSIZE: "5" } })],
    })

    expect(config.extras()).toEqual(["LOADER_MAX_BATCHSIZE"])
    expect(config.sourcesUsed()).toEqual(["default"])
  })

  it("throws a ConfigError describing invalid values", async () => {
    const attempt = loadConfig({
      schema,
      sources: [new EnvSource({ env: { LOADER_SCHEDULER: "hourly" } })],
    })

    await expect(attempt).rejects.toBeInstanceOf(ConfigError)
    await expect(attempt).rejects.toThrow(/LOADER_SCHEDULER/)
  })

  it("carries the code and source names on the error", async () => {
    const err = await loadConfig({
      schema,
      sources: [new ObjectSource({ LOADER_MAX_BATCH_SIZE: "-1" }, "cli")],
    }).catch((e: unknown) => e)

    expect(isAppError(err)).toBe(true)
    if (!(err instanceof ConfigError)) throw new Error("expected ConfigError")
    expect(err.code).toBe("config_invalid")
    expect(err.context).toEqual({ sources: ["object:cli"] })
  })

  it("accepts zod/mini schemas", async () => {
    const miniSchema = zm.object({
      LOADER_BATCH_INTERVAL_MS: zm._default(zm.coerce.number(), 5),
      LOADER_SCHEDULER: zm.enum(["microtask", "interval"]),
    })

    const config = await loadConfig({
      schema: miniSchema,
      sources: [new EnvSource({ env: { LOADER_SCHEDULER: "interval" } })],
    })

    expect(config.value).toEqual({ LOADER_BATCH_INTERVAL_MS: 5, LOADER_SCHEDULER: "interval" })

    const attempt = loadConfig({
      schema: miniSchema,
      sources: [new EnvSource({ env: { LOADER_SCHEDULER: "hourly" } })],
    })

    await expect(attempt).rejects.toBeInstanceOf(ConfigError)
    await expect(attempt).rejects.toThrow(/LOADER_SCHEDULER/)
  })
})
