/**
 * Player Status Tool - Get current Spotify player state, devices, and queue.
 */

import { toolsMetadata } from '../../config/metadata.ts';
import type { GatewayError, Result } from '../../core/errors.ts';
import { SpotifyStatusInputSchema } from '../../schemas/inputs.ts';
import {
  ToolOutputObject,
  type PlayerState,
  type Queue,
  type SlimDevice,
} from '../../schemas/outputs.ts';
import { describeTrack } from '../../utils/format.ts';
import { fail, ok } from './results.ts';
import { defineTool } from './types.ts';

type StatusData = {
  player?: PlayerState | null;
  devices?: SlimDevice[];
  queue?: Queue;
};

const skipped = <T>(): Promise<Result<T> | undefined> => Promise.resolve(undefined);

function describeStatus(data: StatusData, devicesRequested: boolean): string {
  const parts: string[] = [];
  const player = data.player;

  if (player === null) {
    parts.push('Nothing is playing and no device is active.');
  } else if (player) {
    const device = player.device?.name ? ` on '${player.device.name}'` : '';
    parts.push(player.is_playing ? `Playing${device}.` : `Paused${device}.`);
    if (player.current_track) {
      parts.push(`Current track: ${describeTrack(player.current_track)}.`);
    }
    if (player.shuffle_state !== undefined || player.repeat_state) {
      parts.push(
        `Shuffle ${player.shuffle_state ? 'on' : 'off'}, repeat ${player.repeat_state ?? 'off'}.`,
      );
    }
  }

  if (devicesRequested) {
    const devices = data.devices ?? [];
    if (devices.length === 0) {
      parts.push('No devices available. Ask the user to open Spotify on a device.');
    } else {
      const list = devices
        .map((d) => `${d.name} (${d.type}${d.is_active ? ', active' : ''}) id=${d.id ?? 'n/a'}`)
        .join('; ');
      parts.push(`Devices: ${list}.`);
    }
  }

  if (data.queue) {
    const upcoming = data.queue.queue.slice(0, 5).map((t) => t.name);
    parts.push(
      upcoming.length > 0
        ? `Up next: ${upcoming.join(', ')}${data.queue.queue.length > 5 ? ', …' : ''}.`
        : 'Queue is empty.',
    );
  }

  return parts.join(' ');
}

export const playerStatusTool = defineTool({
  name: toolsMetadata.player_status.name,
  title: toolsMetadata.player_status.title,
  description: toolsMetadata.player_status.description,
  inputSchema: SpotifyStatusInputSchema,
  outputSchema: ToolOutputObject.shape,
  annotations: {
    title: toolsMetadata.player_status.title,
    readOnlyHint: true,
    openWorldHint: true,
  },

  handler: async (args, context) => {
    const { gateway } = context.services;
    const wanted = new Set(args.include);

    const [player, devices, queue] = await Promise.all([
      wanted.has('player') ? gateway.getPlayerState() : skipped<PlayerState | null>(),
      wanted.has('devices') ? gateway.listDevices() : skipped<SlimDevice[]>(),
      wanted.has('queue') ? gateway.getQueue() : skipped<Queue>(),
    ]);

    const data: StatusData = {};
    let error: GatewayError | undefined;
    if (player) {
      if (player.ok) {
        data.player = player.value;
      } else {
        error ??= player.error;
      }
    }
    if (devices) {
      if (devices.ok) {
        data.devices = devices.value;
      } else {
        error ??= devices.error;
      }
    }
    if (queue) {
      if (queue.ok) {
        data.queue = queue.value;
      } else {
        error ??= queue.error;
      }
    }

    // Any failed section fails the whole call.
    if (error) {
      return fail('status', error, context);
    }
    return ok('status', data, describeStatus(data, wanted.has('devices')));
  },
});
