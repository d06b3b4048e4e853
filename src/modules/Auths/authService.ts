// src/modules/Auths/authService.ts
import bcrypt from "bcryptjs";
import jwt, { type SignOptions } from "jsonwebtoken";
import { z } from "zod";
import { env } from "../../config/env";
import type { ServiceDeps } from "../../store";
import { Role, type Actor } from "../../policies/accessPolicy";
import { AuthenticationError, ConflictError, NotFoundError } from "../../utils/errors";
import { logger } from "../../utils/logger";
import { success } from "../../utils/result";
import { parseInput } from "../../utils/validation";
import {
  LoginInputSchema,
  RegisterInputSchema,
  toPublicAccount,
  type Account,
  type AuthPayload,
} from "./authModel";

const SALT_ROUNDS = 10;
// Stands in for the hash of an unknown username; login always runs one compare
const UNKNOWN_ACCOUNT_HASH = bcrypt.hashSync("unknown-account", SALT_ROUNDS);
const TOKEN_OPTIONS: SignOptions = { expiresIn: "2h", algorithm: "HS256" };

const AuthPayloadSchema = z.object({
  accountId: z.string().min(1),
  role: z.enum([Role.Admin, Role.Tenant]),
  tenantId: z.string().min(1).nullable(),
  exp: z.number().optional(),
});

export function generateToken(actor: AuthPayload) {
  const { accountId, role, tenantId } = actor;
  return jwt.sign({ accountId, role, tenantId }, env.JWT_SECRET, TOKEN_OPTIONS);
}

/** Verifies a token and returns the actor it carries plus its expiry (seconds). */
export function verifyToken(token: string): { actor: Actor; exp: number | undefined } {
  let decoded: unknown;
  try {
    decoded = jwt.verify(token, env.JWT_SECRET, { algorithms: ["HS256"] });
  } catch {
    throw new AuthenticationError("Invalid or expired token.");
  }
  const payload = AuthPayloadSchema.safeParse(decoded);
  if (!payload.success) throw new AuthenticationError("Invalid or expired token.");
  const { exp, ...actor } = payload.data;
  return { actor, exp };
}

export const createAuthService = ({ store }: ServiceDeps) => {
  const actorFor = async (account: Account): Promise<Actor> => {
    if (account.isAdmin) return { accountId: account.accountId, role: Role.Admin, tenantId: null };
    const tenant = await store.tenants.findByAccount(account.accountId);
    return { accountId: account.accountId, role: Role.Tenant, tenantId: tenant ? tenant.tenantId : null };
  };

  return {
    // Creates the account and its tenant profile together
    async register(input: unknown) {
      const { username, firstName, lastName, email, password, phone } = parseInput(
        RegisterInputSchema,
        input
      );

      const existing = await store.accounts.findByUsername(username);
      if (existing) throw new ConflictError("A user with that username already exists.");

      const passwordHash = await bcrypt.hash(password, SALT_ROUNDS);
      const { account, tenant } = await store.transaction(async (tx) => {
        const account = await tx.accounts.create({
          username,
          firstName,
          lastName,
          email,
          passwordHash,
          isAdmin: false,
        });
        const tenant = await tx.tenants.create({ accountId: account.accountId, phone });
        return { account, tenant };
      });

      logger.info({ accountId: account.accountId, tenantId: tenant.tenantId }, "tenant registered");
      return success("Registration successful! Please login to continue.", {
        account: toPublicAccount(account),
        tenant,
      });
    },

    async login(input: unknown) {
      const { username, password } = parseInput(LoginInputSchema, input);

      const account = await store.accounts.findByUsername(username);
      const valid = await bcrypt.compare(password, account ? account.passwordHash : UNKNOWN_ACCOUNT_HASH);
      if (!account || !valid) throw new AuthenticationError("Invalid username or password.");

      const actor = await actorFor(account);
      const token = generateToken(actor);
      const greeting = account.isAdmin
        ? `Welcome, Admin ${account.username}!`
        : `Welcome, ${`${account.firstName} ${account.lastName}`.trim() || account.username}!`;
      return success(greeting, { actor, account: toPublicAccount(account), token });
    },

    async getAccount(actor: Actor) {
      const account = await store.accounts.findById(actor.accountId);
      if (!account) throw new NotFoundError("Account not found.");
      return { actor, account: toPublicAccount(account) };
    },

    /** Creates the administrator account unless the username is already taken. */
    async ensureAdmin(input: { username: string; email: string; password: string }) {
      const existing = await store.accounts.findByUsername(input.username);
      if (existing) return { created: false, account: toPublicAccount(existing) };

      const account = await store.accounts.create({
        username: input.username,
        firstName: "",
        lastName: "",
        email: input.email,
        passwordHash: await bcrypt.hash(input.password, SALT_ROUNDS),
        isAdmin: true,
      });
      logger.info({ accountId: account.accountId }, "administrator created");
      return { created: true, account: toPublicAccount(account) };
    },
  };
};

export type AuthService = ReturnType<typeof createAuthService>;
