import { mkdir, mkdtemp, symlink } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { cleanPath, ResolvedProjectPath } from "./projectPath.js";

describe("ResolvedProjectPath", () => {
  it("matches the project itself and directories beneath it", () => {
    const project = new ResolvedProjectPath("/a/b/c");
    expect(project.matchesCwd("/a/b/c")).toBe(true);
    expect(project.matchesCwd("/a/b/c/")).toBe(true);
    expect(project.matchesCwd("/a/b/c/src/internal")).toBe(true);
  });

  it("rejects siblings and shared name prefixes", () => {
    const project = new ResolvedProjectPath("/a/b/c");
    expect(project.matchesCwd("/a/b/d")).toBe(false);
    expect(project.matchesCwd("/a/b/cd")).toBe(false);
    expect(project.matchesCwd("/a/b")).toBe(false);
    expect(project.matchesCwd("")).toBe(false);
  });

  it("cleans dot segments before comparing", () => {
    const project = new ResolvedProjectPath("/a/b/./c/");
    expect(project.cleaned).toBe("/a/b/c");
    expect(project.matchesCwd("/a/b/x/../c/src")).toBe(true);
  });

  it("matches through symlinks on either side", async () => {
    const root = await mkdtemp(path.join(os.tmpdir(), "sessionscope-project-"));
    const real = path.join(root, "real");
    const link = path.join(root, "link");
    await mkdir(path.join(real, "src"), { recursive: true });
    await symlink(real, link);

    const viaLink = new ResolvedProjectPath(link);
    expect(viaLink.matchesCwd(path.join(real, "src"))).toBe(true);

    const viaReal = new ResolvedProjectPath(real);
    expect(viaReal.matchesCwd(path.join(link, "src"))).toBe(true);
  });
});

describe("cleanPath", () => {
  it("keeps the filesystem root intact", () => {
    expect(cleanPath("/")).toBe("/");
  });
});
