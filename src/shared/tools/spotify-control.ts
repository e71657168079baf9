/**
 * Spotify Control Tool - batch playback operations.
 */

import { toolsMetadata } from '../../config/metadata.ts';
import { describeError, fail as failResult, type Result } from '../../core/errors.ts';
import { type ControlOperation, SpotifyControlInputSchema } from '../../schemas/inputs.ts';
import { ToolOutputObject, type SpotifyControlBatchOutput } from '../../schemas/outputs.ts';
import type { SpotifyGateway } from '../../services/spotify/gateway.ts';
import { logger } from '../../utils/logger.ts';
import { ok } from './results.ts';
import { defineTool } from './types.ts';

type OperationResult = SpotifyControlBatchOutput['results'][number];

const PLAYBACK_ACTIONS = new Set(['play', 'pause', 'next', 'previous', 'seek', 'transfer']);

function missing(field: string, action: string): Promise<Result<void>> {
  return Promise.resolve(failResult('validation_error', `${field} is required for ${action}`));
}

function dispatch(gateway: SpotifyGateway, op: ControlOperation): Promise<Result<void>> {
  const device = op.device_id;
  switch (op.action) {
    case 'play':
      return gateway.play({
        deviceId: device,
        contextUri: op.context_uri,
        uris: op.uris,
        offset: op.offset,
        positionMs: op.position_ms,
      });
    case 'pause':
      return gateway.pause(device);
    case 'next':
      return gateway.next(device);
    case 'previous':
      return gateway.previous(device);
    case 'seek':
      return op.position_ms === undefined
        ? missing('position_ms', 'seek')
        : gateway.seek(op.position_ms, device);
    case 'volume':
      return op.volume_percent === undefined
        ? missing('volume_percent', 'volume')
        : gateway.setVolume(op.volume_percent, device);
    case 'shuffle':
      return op.shuffle === undefined
        ? missing('shuffle', 'shuffle')
        : gateway.setShuffle(op.shuffle, device);
    case 'repeat':
      return op.repeat === undefined
        ? missing('repeat', 'repeat')
        : gateway.setRepeat(op.repeat, device);
    case 'transfer':
      return device === undefined
        ? missing('device_id', 'transfer')
        : gateway.transferPlayback(device, op.transfer_play ?? false);
    case 'queue':
      return op.queue_uri === undefined
        ? missing('queue_uri', 'queue')
        : gateway.addToQueue(op.queue_uri, device);
  }
}

function noteFor(op: ControlOperation): string | undefined {
  switch (op.action) {
    case 'volume':
      return `volume ${op.volume_percent}%`;
    case 'seek':
      return `position ${op.position_ms}ms`;
    case 'shuffle':
      return `shuffle ${op.shuffle ? 'on' : 'off'}`;
    case 'repeat':
      return `repeat ${op.repeat}`;
    case 'queue':
      return op.queue_uri;
    case 'play':
      return op.context_uri ?? op.uris?.[0];
    default:
      return undefined;
  }
}

export const spotifyControlTool = defineTool({
  name: toolsMetadata.spotify_control.name,
  title: toolsMetadata.spotify_control.title,
  description: toolsMetadata.spotify_control.description,
  inputSchema: SpotifyControlInputSchema,
  outputSchema: ToolOutputObject.shape,
  annotations: {
    title: toolsMetadata.spotify_control.title,
    readOnlyHint: false,
    idempotentHint: false,
    openWorldHint: true,
  },

  handler: async (args, context) => {
    const { gateway, loginUrl } = context.services;

    const runOp = async (operation: ControlOperation, index: number): Promise<OperationResult> => {
      const result = await dispatch(gateway, operation);
      const base = {
        index,
        action: operation.action,
        note: noteFor(operation),
        ...(operation.device_id ? { device_id: operation.device_id } : {}),
      };
      if (result.ok) {
        return { ...base, ok: true };
      }
      return {
        ...base,
        ok: false,
        error: describeError(result.error, loginUrl),
        code: result.error.kind,
      };
    };

    let results: OperationResult[];
    if (args.parallel) {
      results = await Promise.all(args.operations.map(runOp));
    } else {
      results = [];
      for (const [index, operation] of args.operations.entries()) {
        results.push(await runOp(operation, index));
      }
    }

    const okActions = results.filter((r) => r.ok).map((r) => r.action);
    const failed = results.filter((r) => !r.ok);

    let summary =
      okActions.length > 0 ? `Successful: ${okActions.join(', ')}.` : 'No successful operations.';
    if (failed.length > 0) {
      const details = failed
        .map((r) => [r.action, r.code ? `[${r.code}]` : '', r.error ?? ''].filter(Boolean).join(' '))
        .join(' | ');
      summary += ` Failed (${failed.length}): ${details}`;
    }

    if (okActions.some((action) => PLAYBACK_ACTIONS.has(action) || action === 'volume')) {
      const player = await gateway.getPlayerState();
      if (player.ok && player.value) {
        const state = player.value;
        const device = state.device?.name ? ` on '${state.device.name}'` : '';
        summary += state.is_playing ? ` Now playing${device}.` : ` Playback is paused${device}.`;
        if (state.current_track) {
          summary += ` Current track: '${state.current_track.name}'.`;
        }
        if (okActions.includes('volume') && typeof state.device?.volume_percent === 'number') {
          summary += ` Volume: ${state.device.volume_percent}%.`;
        }
      } else if (player.ok) {
        summary += ' No active device. Ask the user to open Spotify or transfer playback.';
      } else {
        await logger.warning('spotify_control', {
          message: 'Could not read player state after control',
          error: player.error.kind,
        });
      }
    }

    await logger.info('spotify_control', {
      message: 'Control batch finished',
      ok: okActions.length,
      failed: failed.length,
      parallel: Boolean(args.parallel),
    });

    const batch: SpotifyControlBatchOutput = {
      _msg: summary,
      results,
      summary: { ok: okActions.length, failed: failed.length },
    };
    return ok('control', batch, summary);
  },
});
