import { toolsMetadata } from '../../config/metadata.ts';
import { AuthStatusInputSchema } from '../../schemas/inputs.ts';
import { ToolOutputObject } from '../../schemas/outputs.ts';
import { fail, ok } from './results.ts';
import { defineTool } from './types.ts';

export const authStatusTool = defineTool({
  name: toolsMetadata.auth_status.name,
  title: toolsMetadata.auth_status.title,
  description: toolsMetadata.auth_status.description,
  inputSchema: AuthStatusInputSchema,
  outputSchema: ToolOutputObject.shape,
  annotations: {
    title: toolsMetadata.auth_status.title,
    readOnlyHint: true,
    openWorldHint: true,
  },
  handler: async (args, context) => {
    const { services } = context;
    const status = await services.tokens.getStatus();

    if (!status.authenticated) {
      const msg = `Not connected to Spotify. Open ${services.loginUrl} to sign in.`;
      return ok('status', { ...status, login_url: services.loginUrl }, msg);
    }

    const expires = status.expiresAt ? new Date(status.expiresAt).toISOString() : 'unknown';
    if (!args.include_profile) {
      return ok(
        'status',
        status,
        `Connected to Spotify. Access token valid until ${expires}; ${status.scopes.length} scope(s) granted.`,
      );
    }

    const profile = await services.gateway.getCurrentUser();
    if (!profile.ok) {
      return fail('status', profile.error, context);
    }
    const who = profile.value.display_name ?? profile.value.id;
    const plan = profile.value.product ? ` (${profile.value.product})` : '';
    return ok(
      'status',
      { ...status, profile: profile.value },
      `Connected to Spotify as ${who}${plan}. Access token valid until ${expires}.`,
    );
  },
});
