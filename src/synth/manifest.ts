// Cargo Manifest
// Cargo.toml for a crate wrapping one generated Rust module as its library.

import type { GraphInfo } from "../types.js";
import { defaultModuleName } from "./shared.js";

export interface ManifestOptions {
	/** Defaults to the module name */
	packageName?: string | undefined;
	version?: string | undefined;
	edition?: string | undefined;
	/** Library source path relative to the manifest */
	libPath?: string | undefined;
}

/** Dependencies every generated module needs. */
export const GENERATED_DEPENDENCIES: readonly (readonly [string, string])[] = [
	["serde", "{ version = \"1.0\", features = [\"derive\"] }"],
	["serde_json", "\"1.0\""],
];

function tomlString(value: string): string {
	return JSON.stringify(value);
}

export function generateCargoManifest(graph: GraphInfo, options: ManifestOptions = {}): string {
	const lines = [
		"[package]",
		"name = " + tomlString(options.packageName ?? defaultModuleName(graph)),
		"version = " + tomlString(options.version ?? "0.1.0"),
		"edition = " + tomlString(options.edition ?? "2021"),
		"",
		"[lib]",
		"path = " + tomlString(options.libPath ?? "src/lib.rs"),
		"",
		"[dependencies]",
		...GENERATED_DEPENDENCIES.map(([name, spec]) => name + " = " + spec),
	];
	return lines.join("\n") + "\n";
}
