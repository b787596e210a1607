import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { thrown } from "../../tests/utils/thrown"
import { embedConfigValue, embedConfigValueOpt, inspectConfigValue } from "../embed"

describe("embedConfigValue e2e", () => {
  let cwd: string

  beforeEach(async () => {
    cwd = await fs.mkdtemp(path.join(os.tmpdir(), "embedded-config-e2e-"))
  })

  afterEach(async () => {
    await fs.rm(cwd, { recursive: true, force: true })
  })

  async function writeProject(document: string) {
    await fs.writeFile(
      path.join(cwd, "embedcfg.toml"),
      '[package]\nname = "greeter"\n\n[package.metadata.embedded-config]\npath = "config/app.toml"\n',
    )
    await fs.mkdir(path.join(cwd, "config"))
    await fs.writeFile(path.join(cwd, "config", "app.toml"), document)
  }

  it("resolves values through the manifest on disk", async () => {
    await writeProject(
      '[hello_world_example]\nname = "World"\nrepeat = 3\nloud = true\nratio = 0.5\n',
    )
    const env = { EMBEDDED_CONFIG_ROOT: cwd }

    expect(embedConfigValue("hello_world_example.name", { env })).toBe("World")
    expect(embedConfigValue("hello_world_example.repeat", { env })).toBe(3n)
    expect(embedConfigValue("hello_world_example.loud", { env })).toBe(true)
    expect(embedConfigValue("hello_world_example.ratio", { env })).toBe(0.5)
    expect(embedConfigValueOpt("hello_world_example.custom_greet", { env })).toBeUndefined()
  })

  it("reports where the value came from", async () => {
    await writeProject('[hello_world_example]\nname = "World"\n')

    const result = inspectConfigValue("hello_world_example.name", {
      env: { EMBEDDED_CONFIG_ROOT: cwd },
    })

    expect(result.source).toEqual({
      path: path.join(cwd, "config", "app.toml"),
      origin: "manifest",
    })
  })

  it("prefers the override even when the manifest is unreadable", async () => {
    await fs.writeFile(path.join(cwd, "embedcfg.toml"), "this is = = not toml")
    const override = path.join(cwd, "override.toml")
    await fs.writeFile(override, 'greeting = "Hi"\n')

    const value = embedConfigValue("greeting", {
      env: { EMBEDDED_CONFIG_PATH: override, EMBEDDED_CONFIG_ROOT: cwd },
    })

    expect(value).toBe("Hi")
  })

  it("reports the byte offset of invalid UTF-8", async () => {
    const override = path.join(cwd, "broken.toml")
    await fs.writeFile(override, Buffer.from([0x6b, 0x20, 0x3d, 0x20, 0xc3, 0x28]))

    const err = thrown(() =>
      embedConfigValue("k", { env: { EMBEDDED_CONFIG_PATH: override } }),
    )

    expect(err).toMatchObject({
      code: "invalid_encoding",
      site: "invocation",
      message: `loading config: loading ${override} lead to a decode error: invalid utf-8 character at byte 4`,
    })
  })

  it("maps a directory read to source_read_error", async () => {
    const err = thrown(() => embedConfigValue("k", { env: { EMBEDDED_CONFIG_PATH: cwd } }))

    expect(err).toMatchObject({ code: "source_read_error", site: "invocation" })
  })

  it("sees edits made between resolutions", async () => {
    const override = path.join(cwd, "live.toml")
    const env = { EMBEDDED_CONFIG_PATH: override }

    await fs.writeFile(override, "version = 1\n")
    const before = embedConfigValue("version", { env })

    await fs.writeFile(override, "version = 2\n")
    const after = embedConfigValue("version", { env })

    expect([before, after]).toEqual([1n, 2n])
  })
})
