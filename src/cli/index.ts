#!/usr/bin/env node
/**
 * xcsync CLI
 *
 * Registers source files in Xcode projects, and drives xcodebuild/simctl
 */
import * as path from 'path';
import { Command } from 'commander';
import { syncSources, verifyProject } from '../core/sync.js';
import { formatSync, formatVerify } from '../formatters/index.js';
import { OutputFormat } from '../types/index.js';
import { BuildFailedError } from '../core/errors.js';
import { locateProject } from '../parsers/project-locator.js';
import { ExecaRunner } from '../devices/runner.js';
import { DEFAULT_DESTINATION, XcodeToolchain, productPath } from '../devices/xcode.js';
import { startMcpServer } from '../mcp/server.js';
import packageJson from '../../package.json';

interface OutputOptions {
  format: string;
  verbose: boolean;
  color: boolean;
}

interface AddOptions extends OutputOptions {
  dryRun: boolean;
  target?: string;
  sourceRoot?: string;
  createGroups: boolean;
  config?: string;
}

interface BuildCommandOptions {
  scheme: string;
  destination: string;
  configuration: string;
  derivedData?: string;
  verbose: boolean;
}

interface LaunchOptions extends BuildCommandOptions {
  udid: string;
  bundleId: string;
  skipBuild: boolean;
}

interface ScreenshotOptions {
  udid: string;
  output: string;
  verbose: boolean;
}

const program = new Command();

program
  .name('xcsync')
  .description('Keep Xcode project descriptors in sync with source files on disk')
  .version(packageJson.version);

program
  .command('add')
  .description('Register source files that exist on disk but are missing from the project')
  .argument('<path>', 'Path to project.pbxproj, .xcodeproj, .xcworkspace, or directory')
  .argument('[files...]', 'Files to register; the source root is scanned when omitted')
  .option('-n, --dry-run', 'Show what would be added without writing', false)
  .option('-t, --target <name>', 'Native target to compile the files into')
  .option('-s, --source-root <dir>', 'Directory to scan for sources')
  .option('--no-create-groups', 'Use the closest existing group instead of creating new ones')
  .option('-c, --config <file>', 'Path to xcsync.config.json')
  .option('-f, --format <format>', 'Output format: text, json', 'text')
  .option('-v, --verbose', 'Show verbose output', false)
  .option('--no-color', 'Disable colored output')
  .action(async (projectPath: string, files: string[], options: AddOptions) => {
    try {
      const outputFormat = parseOutputFormat(options.format);
      const result = await syncSources({
        path: projectPath,
        files,
        sourceRoot: options.sourceRoot,
        target: options.target,
        createGroups: options.createGroups,
        dryRun: options.dryRun,
        configPath: options.config,
      });
      console.log(formatSync(result, outputFormat, { color: options.color }));
    } catch (error) {
      exitWithError(error, options.verbose);
    }
  });

program
  .command('verify')
  .description('Report dangling and duplicate references in the project descriptor')
  .argument('<path>', 'Path to project.pbxproj, .xcodeproj, .xcworkspace, or directory')
  .option('-f, --format <format>', 'Output format: text, json', 'text')
  .option('-v, --verbose', 'Show verbose output', false)
  .option('--no-color', 'Disable colored output')
  .action(async (projectPath: string, options: OutputOptions) => {
    try {
      const outputFormat = parseOutputFormat(options.format);
      const result = await verifyProject(projectPath);
      console.log(formatVerify(result, outputFormat, { color: options.color }));

      if (result.issues.length > 0) {
        process.exit(1);
      }
    } catch (error) {
      exitWithError(error, options.verbose);
    }
  });

program
  .command('build')
  .description('Build a scheme with xcodebuild')
  .argument('<path>', 'Path to .xcodeproj, .xcworkspace, or directory')
  .requiredOption('--scheme <name>', 'Scheme to build')
  .option('--destination <spec>', 'xcodebuild destination', DEFAULT_DESTINATION)
  .option('--configuration <name>', 'Build configuration', 'Debug')
  .option('--derived-data <dir>', 'Derived data directory')
  .option('-v, --verbose', 'Show verbose output', false)
  .action(async (projectPath: string, options: BuildCommandOptions) => {
    try {
      const toolchain = new XcodeToolchain(new ExecaRunner());
      await toolchain.build({
        project: resolveBuildable(projectPath),
        scheme: options.scheme,
        destination: options.destination,
        configuration: options.configuration,
        derivedDataPath: options.derivedData,
      });
      console.log(`✅ Built ${options.scheme}`);
    } catch (error) {
      exitWithError(error, options.verbose);
    }
  });

program
  .command('launch')
  .description('Build, install and launch an app on a simulator')
  .argument('<path>', 'Path to .xcodeproj, .xcworkspace, or directory')
  .requiredOption('--scheme <name>', 'Scheme to build')
  .requiredOption('--udid <udid>', 'Simulator UDID')
  .requiredOption('--bundle-id <id>', 'Bundle identifier of the app')
  .option('--destination <spec>', 'xcodebuild destination', DEFAULT_DESTINATION)
  .option('--configuration <name>', 'Build configuration', 'Debug')
  .option('--derived-data <dir>', 'Derived data directory')
  .option('--skip-build', 'Install the existing build product', false)
  .option('-v, --verbose', 'Show verbose output', false)
  .action(async (projectPath: string, options: LaunchOptions) => {
    try {
      const project = resolveBuildable(projectPath);
      const derivedDataPath = options.derivedData ?? path.join(path.dirname(project), 'build', 'DerivedData');
      const toolchain = new XcodeToolchain(new ExecaRunner());

      if (!options.skipBuild) {
        await toolchain.build({
          project,
          scheme: options.scheme,
          destination: options.destination,
          configuration: options.configuration,
          derivedDataPath,
        });
      }
      if (await toolchain.bootSimulator(options.udid)) {
        console.error(`Booted simulator ${options.udid}`);
      }
      await toolchain.install(options.udid, productPath(derivedDataPath, options.scheme, options.configuration));
      await toolchain.launch(options.udid, options.bundleId);
      console.log(`🚀 Launched ${options.bundleId} on ${options.udid}`);
    } catch (error) {
      exitWithError(error, options.verbose);
    }
  });

program
  .command('screenshot')
  .description('Capture a simulator screenshot')
  .requiredOption('--udid <udid>', 'Simulator UDID')
  .option('-o, --output <file>', 'Output PNG path', 'screenshot.png')
  .option('-v, --verbose', 'Show verbose output', false)
  .action(async (options: ScreenshotOptions) => {
    try {
      const toolchain = new XcodeToolchain(new ExecaRunner());
      await toolchain.bootSimulator(options.udid);
      const outputPath = path.resolve(options.output);
      await toolchain.screenshot(options.udid, outputPath);
      console.log(`📸 Saved ${outputPath}`);
    } catch (error) {
      exitWithError(error, options.verbose);
    }
  });

program
  .command('mcp')
  .description('Start MCP (Model Context Protocol) server for AI agent integration')
  .action(async () => {
    try {
      await startMcpServer();
    } catch (error) {
      exitWithError(error, false);
    }
  });

function parseOutputFormat(format: string): OutputFormat {
  switch (format.toLowerCase()) {
    case 'text':
      return OutputFormat.Text;
    case 'json':
      return OutputFormat.JSON;
    default:
      throw new Error(`Unknown output format: ${format}. Use text or json.`);
  }
}

/**
 * xcodebuild wants the bundle itself
 */
function resolveBuildable(inputPath: string): string {
  const resolved = path.resolve(inputPath);
  if (resolved.endsWith('.xcodeproj') || resolved.endsWith('.xcworkspace')) {
    return resolved;
  }
  return locateProject(inputPath).xcodeprojPath;
}

function exitWithError(error: unknown, verbose: boolean): never {
  if (error instanceof Error) {
    console.error(`Error: ${error.message}`);
    if (error instanceof BuildFailedError && error.outputTail) {
      console.error(error.outputTail);
    }
    if (verbose) {
      console.error(error.stack);
    }
  } else {
    console.error('An unknown error occurred');
  }
  process.exit(1);
}

program.parse();
