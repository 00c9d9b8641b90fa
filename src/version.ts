import fs from "node:fs";

function readVersionFromPackageJson(): string | null {
  // Sources sit one level below package.json, the build output two.
  for (const candidate of ["../package.json", "../../package.json"]) {
    const url = new URL(candidate, import.meta.url);
    if (!fs.existsSync(url)) continue;
    const pkg: unknown = JSON.parse(fs.readFileSync(url, "utf-8"));
    if (typeof pkg !== "object" || pkg === null) continue;
    if ("name" in pkg && pkg.name === "convergent" && "version" in pkg && typeof pkg.version === "string") {
      return pkg.version;
    }
  }
  return null;
}

// Single source of truth for the current convergent version.
export const VERSION = process.env.CONVERGENT_BUNDLED_VERSION || readVersionFromPackageJson() || "0.0.0";
