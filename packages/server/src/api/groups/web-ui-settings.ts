import { Group, readJsonBody } from "@my-app/rest-api";
import type { WebUiSettingManager } from "@my-app/core/database";
import { z } from "zod";
import { withResourceErrors } from "../errors.js";
import { principalOf, type Principal } from "../principal.js";
import { resourceSet, singleResource } from "../responses.js";

const SettingBodySchema = z.object({
  setting: z.string().trim().min(1).max(64),
  value: z.string().max(4096),
});

export interface WebUiSettingsGroupDeps {
  webUiSettings: WebUiSettingManager;
}

export function webUiSettingsGroup(deps: WebUiSettingsGroupDeps): Group<Principal> {
  return new Group<Principal>({
    urlPrefix: "web_ui_settings",
    description: "Per-user settings of the web interface",
  })
    .addEndpoint({
      urlSuffixes: ["settings", "settings/"],
      httpMethods: ["GET"],
      name: "settings",
      description: "Retrieves the token owner's settings",
      authNeeded: true,
      authScopes: { GET: ["web_ui_settings.retrieve"] },
      handler: (auth) =>
        withResourceErrors(() => resourceSet(deps.webUiSettings.list(principalOf(auth).user))),
    })
    .addEndpoint({
      urlSuffixes: ["setting"],
      httpMethods: ["POST"],
      name: "setting",
      description: "Creates or replaces a setting",
      authNeeded: true,
      authScopes: { POST: ["web_ui_settings.update"] },
      handler: (auth, _match, request) =>
        withResourceErrors(() => {
          const { user } = principalOf(auth);
          const { setting, value } = readJsonBody(request, SettingBodySchema);
          return singleResource(deps.webUiSettings.set(user, setting, value));
        }),
    });
}
