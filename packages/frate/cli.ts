#!/usr/bin/env tsx

import { Command } from "commander"
import { addCommand } from "@/commands/add"
import { cleanCommand } from "@/commands/clean"
import { initCommand } from "@/commands/init"
import { installCommand } from "@/commands/install"
import { listCommand } from "@/commands/list"
import { removeCommand } from "@/commands/remove"
import { runCommand } from "@/commands/run"
import { searchCommand } from "@/commands/search"
import { shimPathCommand } from "@/commands/shim-path"
import { syncCommand } from "@/commands/sync"
import { uninstallCommand } from "@/commands/uninstall"
import { whichCommand } from "@/commands/which"
import pkg from "./package.json" with { type: "json" }

async function main(): Promise<void> {
	const program = new Command()

	program
		.name("frate")
		.description("Install project tools into a user-level cache")
		.version(pkg.version, "-V, --version", "Output the version number")
		.showHelpAfterError()
		.showSuggestionAfterError()
		.enablePositionalOptions()

	program
		.command("init")
		.description("Create a frate.toml in the current directory")
		.action(async () => {
			await initCommand()
		})

	program
		.command("add")
		.description("Add a tool to frate.toml and lock it (does not install)")
		.argument("<spec>", "Tool and version requirement: <name>@<version>")
		.action(async (spec: string) => {
			await addCommand(spec)
		})

	program
		.command("remove")
		.description("Remove a tool from frate.toml and frate.lock")
		.argument("<name>", "Tool name")
		.action(async (name: string) => {
			await removeCommand(name)
		})

	program
		.command("sync")
		.description("Sync frate.lock with frate.toml")
		.option("--refresh", "Re-resolve tools whose locked version was withdrawn")
		.action(async (options: { refresh?: boolean }) => {
			await syncCommand({ refresh: Boolean(options.refresh) })
		})

	program
		.command("install")
		.description("Install tools from frate.lock (all by default)")
		.option("--name <name>", "Install one specific tool")
		.action(async (options: { name?: string }) => {
			await installCommand({ name: options.name })
		})

	program
		.command("uninstall")
		.description("Remove installed tools and their shims (all by default)")
		.option("--name <name>", "Uninstall one specific tool")
		.action(async (options: { name?: string }) => {
			await uninstallCommand({ name: options.name })
		})

	program
		.command("clean")
		.description("Delete cached tools, shims and downloads")
		.option("--name <name>", "Clean one specific tool")
		.option("-y, --yes", "Do not ask for confirmation")
		.action(async (options: { name?: string; yes?: boolean }) => {
			await cleanCommand({ name: options.name, yes: Boolean(options.yes) })
		})

	program
		.command("list")
		.description("List tools declared in frate.toml")
		.option("-v, --verbose", "Show lock details")
		.action(async (options: { verbose?: boolean }) => {
			await listCommand({ verbose: Boolean(options.verbose) })
		})

	program
		.command("which")
		.description("Show the executable and shim paths of an installed tool")
		.argument("<name>", "Tool name")
		.option("-v, --verbose", "Show version and binary candidates")
		.action(async (name: string, options: { verbose?: boolean }) => {
			await whichCommand(name, { verbose: Boolean(options.verbose) })
		})

	program
		.command("search")
		.description("Show the versions a tool has in the registry")
		.argument("<name>", "Tool name")
		.action(async (name: string) => {
			await searchCommand(name)
		})

	program
		.command("run")
		.description("Run an installed tool")
		.argument("<name>", "Tool name")
		.argument("[args...]", "Arguments passed to the tool")
		.passThroughOptions()
		.action(async (name: string, args: string[]) => {
			await runCommand(name, args)
		})

	program
		.command("shim-path")
		.description("Print the directory to add to PATH")
		.action(() => {
			shimPathCommand()
		})

	if (process.argv.length <= 2) {
		program.outputHelp()
		return
	}

	await program.parseAsync(process.argv)
}

void main()
