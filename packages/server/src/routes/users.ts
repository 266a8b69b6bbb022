import { FastifyInstance } from "fastify";
import { NotFoundError, parseUserInput } from "@timeslot/core";
import type { User } from "@timeslot/core";

function toUserResponse(user: User) {
  return {
    id: user.id,
    email: user.email,
    name: user.name,
    createdAt: user.createdAt.toISOString(),
  };
}

export async function registerUserRoutes(
  fastify: FastifyInstance,
): Promise<void> {
  fastify.get("/api/users", async () => {
    return { users: fastify.db.listUsers().map(toUserResponse) };
  });

  fastify.get<{ Params: { id: string } }>(
    "/api/users/:id",
    async (request) => {
      return toUserResponse(fastify.db.requireUser(request.params.id));
    },
  );

  // POST /api/users - 409 when the email is taken
  fastify.post("/api/users", async (request, reply) => {
    const user = fastify.db.createUser(parseUserInput(request.body));
    return reply.code(201).send(toUserResponse(user));
  });

  // DELETE /api/users/:id - also removes the user's recurring settings
  fastify.delete<{ Params: { id: string } }>(
    "/api/users/:id",
    async (request, reply) => {
      if (!fastify.db.deleteUser(request.params.id)) {
        throw new NotFoundError(`User ${request.params.id} not found`);
      }
      return reply.code(204).send();
    },
  );
}
