import * as fs from "node:fs/promises";
import { join, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import * as yaml from "js-yaml";
import { z } from "zod";
import { ConfigError, ToolSchema, ToolSpecSchema, type SandboxFile, type ToolInstallation } from "@patchloop/core";

const MANIFEST_FILE = "tools.yaml";
const EXECUTABLE = 0o755;

const BundleToolSchema = z.object({ script: z.string().min(1).optional() }).and(ToolSpecSchema);

const BundleManifestSchema = z.object({
    name: z.string().min(1),
    binDir: z
        .string()
        .regex(/^[^/]/, "binDir is relative to the sandbox working directory")
        .default(".patchloop/bin"),
    tools: z.array(BundleToolSchema).min(1),
});

export type BundleManifest = z.infer<typeof BundleManifestSchema>;

export interface ToolBundle extends ToolInstallation {
    name: string;
    schema: ToolSchema;
}

export function defaultBundleDir(): string {
    return fileURLToPath(new URL("../bundles/default/", import.meta.url));
}

export function parseBundleManifest(text: string, source = MANIFEST_FILE): BundleManifest {
    let raw: unknown;
    try {
        raw = yaml.load(text);
    } catch (error) {
        const detail = error instanceof Error ? error.message : String(error);
        throw new ConfigError(`${source} is not valid YAML: ${detail}`);
    }
    const parsed = BundleManifestSchema.safeParse(raw);
    if (!parsed.success) {
        const issues = parsed.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
        throw new ConfigError(`Invalid ${source}: ${issues.join("; ")}`);
    }
    return parsed.data;
}

/**
 * Reads a bundle directory: `tools.yaml` describes the commands, and each
 * command with a `script` has an executable under `bin/`. Scripts are
 * uploaded to `binDir` under the command's name.
 */
export async function loadToolBundle(dir: string = defaultBundleDir()): Promise<ToolBundle> {
    const root = resolve(dir);
    const manifestPath = join(root, MANIFEST_FILE);
    const manifest = parseBundleManifest(await fs.readFile(manifestPath, "utf8"), manifestPath);

    const files: SandboxFile[] = [];
    for (const tool of manifest.tools) {
        if (!tool.script) continue;
        const scriptPath = join(root, "bin", tool.script);
        let content: string;
        try {
            content = await fs.readFile(scriptPath, "utf8");
        } catch (error) {
            const detail = error instanceof Error ? error.message : String(error);
            throw new ConfigError(`Tool "${tool.name}" in ${manifestPath} has no readable script: ${detail}`);
        }
        files.push({ path: `${manifest.binDir.replace(/\/$/, "")}/${tool.name}`, content, mode: EXECUTABLE });
    }

    return {
        name: manifest.name,
        schema: new ToolSchema(manifest.tools.map(({ script: _script, ...spec }) => spec)),
        files,
        binDir: manifest.binDir,
    };
}
