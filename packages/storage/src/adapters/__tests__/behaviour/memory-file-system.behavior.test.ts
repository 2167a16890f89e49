import { createMemoryFileSystem, createNodeFileSystem } from "../../create"
import { MemoryFileSystem, MemoryFileSystemError } from "../../memory-file-system"
import { NodeFileSystem } from "../../node-file-system"

const bytes = (text: string) => new TextEncoder().encode(text)

describe("MemoryFileSystem behavior", () => {
  it("seeds the given directories with their parents", async () => {
    const fileSystem = new MemoryFileSystem({ dirs: ["/srv/cache"] })

    expect(await fileSystem.dirExists("/srv")).toBe(true)
    expect(await fileSystem.dirExists("/srv/cache")).toBe(true)
  })

  it("normalizes paths", async () => {
    const fileSystem = new MemoryFileSystem({ dirs: ["/srv/cache"] })

    await fileSystem.writeFile("/srv/cache/./a/../item.json", bytes("x"))

    expect(await fileSystem.fileExists("/srv/cache/item.json")).toBe(true)
  })

  describe("read-only directories", () => {
    const setup = () =>
      new MemoryFileSystem({ dirs: ["/srv/locked"], readOnlyDirs: ["/srv/locked"] })

    it("reports them as not writable", async () => {
      expect(await setup().isWritableDir("/srv/locked")).toBe(false)
    })

    it("rejects writes inside them with EACCES", async () => {
      await expect(setup().writeFile("/srv/locked/item.json", bytes("x"))).rejects.toMatchObject(
        { code: "EACCES", syscall: "open" },
      )
    })

    it("rejects creating directories inside them with EACCES", async () => {
      await expect(setup().createDir("/srv/locked/ab")).rejects.toMatchObject({
        code: "EACCES",
      })
    })

    it("rejects removing them with EACCES", async () => {
      await expect(setup().removeDirRecursive("/srv/locked")).rejects.toBeInstanceOf(
        MemoryFileSystemError,
      )
    })
  })

  it("rejects createDir over an existing file with EEXIST", async () => {
    const fileSystem = new MemoryFileSystem({ dirs: ["/srv"] })
    await fileSystem.writeFile("/srv/blocker", bytes("x"))

    await expect(fileSystem.createDir("/srv/blocker")).rejects.toMatchObject({ code: "EEXIST" })
  })

  it("rejects readFile on a directory with EISDIR", async () => {
    const fileSystem = new MemoryFileSystem({ dirs: ["/srv"] })

    await expect(fileSystem.readFile("/srv")).rejects.toMatchObject({ code: "EISDIR" })
  })

  it("returns a copy from readFile", async () => {
    const fileSystem = new MemoryFileSystem({ dirs: ["/srv"] })
    await fileSystem.writeFile("/srv/item.json", bytes("abc"))

    const first = await fileSystem.readFile("/srv/item.json")
    first[0] = 120

    expect(new TextDecoder().decode(await fileSystem.readFile("/srv/item.json"))).toBe("abc")
  })

  it("is what createMemoryFileSystem builds", async () => {
    const fileSystem = createMemoryFileSystem({ dirs: ["/srv"] })

    expect(fileSystem).toBeInstanceOf(MemoryFileSystem)
    expect(await fileSystem.dirExists("/srv")).toBe(true)
    expect(createNodeFileSystem()).toBeInstanceOf(NodeFileSystem)
  })
})
