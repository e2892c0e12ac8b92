#!/usr/bin/env node
import { resolve } from 'node:path';
import process from 'node:process';

import { createInProcessRunner, launchRenders, type LaunchReport } from '../launcher/launcher.js';
import { createLogger } from '../logging/logger.js';
import { evaluateSceneAt, lastFrameOf, summarizeEntities } from '../recording/query.js';
import { readRecording } from '../recording/recording.js';
import { createDefaultDependencies } from '../scene/orchestrator.js';
import { startViewerServer } from '../server/viewerServer.js';
import { writeCanonicalJson } from '../serialization/canonicalJson.js';
import { parseInspectArgs, parseRenderArgs, parseServeArgs, UsageError } from './args.js';

const exitWithError = (message: string): never => {
  console.error(message);
  process.exit(1);
};

const printMainUsage = () => {
  console.log(`motionvis – timeline recordings of multi-person motion reconstructions

Commands:
  render --log-root <dir> [--save-root <dir>] [--phases a b ...] [--gpus 0 1 ...] [...]
  inspect <recording.json> [--frame N] [--json]
  serve <recording.json> [--port 9877]

Run "motionvis <command> --help" to learn more about a command.`);
};

const printRenderUsage = () => {
  console.log(`motionvis render

Find every run under the log root and write one recording per run.

Required:
  --log-root <dir>              Directory searched recursively for runs

Optional:
  --save-root <dir>             Write recordings under <dir>/<a>-<b> instead of the run directory
  --phases <name...>            Phases to log in order (default motion_chunks)
  --gpus <id...>                Device ids; more than one renders runs in parallel (default 0)
  --render-views <view...>      Any of src_cam front above side (default all)
  --camera-mode <mode>          shared (default) or per-phase
  --grid                        Add a ground grid
  --render-layers               Project each track's mesh into the source image
  --no-render-kps               Skip 2D skeleton overlays
  --save-frames                 Write a scene snapshot per frame under frames/
  --accumulate                  Keep every frame's mesh visible
  --overwrite                   Replace existing recordings
  --json                        Emit the run report as JSON
`);
};

const printInspectUsage = () => {
  console.log(`motionvis inspect <recording.json>

Summarise a recording, or print the scene at one frame.

Optional:
  --frame <N>     Evaluate the scene at frame N
  --json          Emit JSON instead of a human-readable summary
`);
};

const printServeUsage = () => {
  console.log(`motionvis serve <recording.json>

Stream a recording to viewers over WebSocket. Clients send {"type":"seek","frame":N}.

Optional:
  --port <number>     Port to listen on (default 9877)
`);
};

const printRenderReport = (report: LaunchReport) => {
  for (const { task, report: result } of report.outcomes) {
    if (result.status === 'rendered') {
      console.log(`✔ ${task.logDir} → ${result.recordingPath} (${result.entries} entries)`);
    } else if (result.status === 'skipped') {
      console.log(`• ${task.logDir} skipped: ${result.reason}`);
    } else {
      console.error(`✖ ${task.logDir} failed: ${result.errorName}: ${result.message}`);
    }
  }
  console.log(
    `[render] ${report.rendered} rendered, ${report.skipped} skipped, ${report.failed} failed`,
  );
};

const handleRenderCommand = async (args: string[]) => {
  const command = parseRenderArgs(args);
  if (command.help) {
    printRenderUsage();
    process.exit(0);
  }
  const logger = createLogger('render');
  const report = await launchRenders(
    {
      logRoot: resolve(process.cwd(), command.logRoot),
      saveRoot: command.saveRoot === null ? null : resolve(process.cwd(), command.saveRoot),
      devices: command.devices,
      options: command.options,
    },
    { logger, inProcess: createInProcessRunner(createDefaultDependencies(logger)) },
  );
  if (command.json) {
    console.log(JSON.stringify({ status: report.failed > 0 ? 'error' : 'ok', ...report }, null, 2));
  } else {
    printRenderReport(report);
  }
  if (report.failed > 0) {
    process.exit(1);
  }
};

const handleInspectCommand = async (args: string[]) => {
  const command = parseInspectArgs(args);
  if (command.help) {
    printInspectUsage();
    process.exit(0);
  }
  const document = await readRecording(resolve(process.cwd(), command.recording));
  if (command.frame !== null) {
    const scene = evaluateSceneAt(document.entries, command.frame);
    if (command.json) {
      console.log(writeCanonicalJson(scene, { indent: 2 }));
      return;
    }
    console.log(`[inspect] frame ${scene.frame} on ${scene.timeline}: ${scene.entities.length} entities`);
    for (const entity of scene.entities) {
      console.log(`  ${entity.path}  ${entity.components.map((component) => component.kind).join(', ')}`);
    }
    return;
  }

  const entities = summarizeEntities(document.entries);
  const frameCount = lastFrameOf(document.entries) + 1;
  if (command.json) {
    console.log(
      writeCanonicalJson(
        {
          applicationId: document.applicationId,
          timelines: document.timelines,
          frameCount,
          entries: document.entries.length,
          entities,
        },
        { indent: 2 },
      ),
    );
    return;
  }
  console.log(`[inspect] ${document.applicationId}: ${document.entries.length} entries, ${frameCount} frames`);
  console.log(`  timelines: ${document.timelines.join(', ') || 'none'}`);
  for (const entity of entities) {
    const counts = Object.entries(entity.counts)
      .map(([kind, count]) => `${kind}×${count}`)
      .join(' ');
    console.log(`  ${entity.path}  ${counts}`);
  }
};

const handleServeCommand = async (args: string[]) => {
  const command = parseServeArgs(args);
  if (command.help) {
    printServeUsage();
    process.exit(0);
  }
  const document = await readRecording(resolve(process.cwd(), command.recording));
  const viewer = await startViewerServer(document, { port: command.port });

  const shutdown = () => {
    console.log('\nShutting down viewer server…');
    viewer
      .close()
      .then(() => process.exit(0))
      .catch((error) => exitWithError(error instanceof Error ? error.message : String(error)));
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
};

const main = async () => {
  const [, , ...argv] = process.argv;
  if (argv.length === 0 || argv[0] === '--help' || argv[0] === '-h') {
    printMainUsage();
    process.exit(0);
  }
  const [command, ...rest] = argv;
  switch (command) {
    case 'render':
      await handleRenderCommand(rest);
      break;
    case 'inspect':
      await handleInspectCommand(rest);
      break;
    case 'serve':
      await handleServeCommand(rest);
      break;
    default:
      exitWithError(`Unknown command "${command}".`);
  }
};

main().catch((error) => {
  if (error instanceof UsageError) {
    exitWithError(`${error.message}\nRun "motionvis --help" for usage.`);
  }
  console.error(error instanceof Error ? error.message : error);
  process.exit(1);
});
