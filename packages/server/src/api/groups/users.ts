import { Group, readJsonBody } from "@my-app/rest-api";
import { USER_ROLES, type UserManager } from "@my-app/core/database";
import { z } from "zod";
import { withResourceErrors } from "../errors.js";
import { principalOf, requireResourceId, resourceIdOf, type Principal } from "../principal.js";
import { deleted, resourceSet, singleResource } from "../responses.js";

const UserFieldsSchema = z.object({
  fullname: z.string().trim().min(1).max(128),
  username: z
    .string()
    .trim()
    .regex(/^[a-zA-Z0-9_.-]{1,32}$/, "letters, digits, '.', '_' or '-', at most 32"),
  email: z.email(),
  role: z.enum(USER_ROLES),
});

const CreateUserSchema = UserFieldsSchema.extend({
  role: z.enum(USER_ROLES).default("user"),
});

const UpdateUserSchema = UserFieldsSchema.partial()
  .strict()
  .refine((changes) => Object.keys(changes).length > 0, "nothing to update");

const ChangePasswordSchema = z.strictObject({
  currentPassword: z.string().min(1),
  newPassword: z.string().min(1).max(256),
});

export interface UsersGroupDeps {
  users: UserManager;
}

export function usersGroup(deps: UsersGroupDeps): Group<Principal> {
  return new Group<Principal>({ urlPrefix: "users", description: "User accounts" })
    .addEndpoint({
      urlSuffixes: ["users", "users/", "users/(?<resourceId>[0-9]+)"],
      httpMethods: ["GET"],
      name: "users",
      description: "Retrieves the users the token owner may see, or one by ID",
      authNeeded: true,
      authScopes: { GET: ["users.retrieve"] },
      handler: (auth, match) =>
        withResourceErrors(() => {
          const { user } = principalOf(auth);
          const id = resourceIdOf(match);
          return id === undefined
            ? resourceSet(deps.users.list(user))
            : singleResource(deps.users.get(user, id));
        }),
    })
    .addEndpoint({
      urlSuffixes: ["user"],
      httpMethods: ["POST"],
      name: "user",
      description: "Creates a user; the generated password is only returned here",
      authNeeded: true,
      authScopes: { POST: ["users.create"] },
      handler: (auth, _match, request) =>
        withResourceErrors(() => {
          const { user } = principalOf(auth);
          const body = readJsonBody(request, CreateUserSchema);
          return singleResource(deps.users.create(user, body));
        }),
    })
    .addEndpoint({
      urlSuffixes: ["user/(?<resourceId>[0-9]+)"],
      httpMethods: ["PATCH", "DELETE"],
      name: "user",
      description: "Updates or deletes a user",
      authNeeded: true,
      authScopes: { PATCH: ["users.update"], DELETE: ["users.delete"] },
      handler: (auth, match, request) =>
        withResourceErrors(() => {
          const { user } = principalOf(auth);
          const id = requireResourceId(match);
          if (request.method === "DELETE") {
            deps.users.delete(user, id);
            return deleted();
          }
          const changes = readJsonBody(request, UpdateUserSchema);
          return singleResource(deps.users.update(user, id, changes));
        }),
    })
    .addEndpoint({
      urlSuffixes: ["password"],
      httpMethods: ["POST"],
      name: "password",
      description: "Changes the token owner's password, given the current one",
      authNeeded: true,
      authScopes: { POST: ["users.change_password"] },
      handler: (auth, _match, request) =>
        withResourceErrors(() => {
          const { user } = principalOf(auth);
          const body = readJsonBody(request, ChangePasswordSchema);
          deps.users.changePassword(user, body.currentPassword, body.newPassword);
          return singleResource(deps.users.get(user, user.id));
        }),
    });
}
