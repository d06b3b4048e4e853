// src/modules/Auths/authModel.ts
import { z } from "zod";
import type { Actor } from "../../policies/accessPolicy";

export interface Account {
  accountId: string;
  username: string;
  firstName: string;
  lastName: string;
  email: string;
  passwordHash: string;
  isAdmin: boolean;
  createdAt: Date;
}

export type PublicAccount = Omit<Account, "passwordHash">;

export type AccountInput = Omit<Account, "accountId" | "createdAt">;

export type AuthPayload = Actor;

export const RegisterInputSchema = z
  .object({
    username: z
      .string()
      .trim()
      .min(1, "This field is required.")
      .max(150)
      .regex(/^[\w.@+-]+$/, "Enter a valid username."),
    firstName: z.string().trim().min(1, "This field is required.").max(30),
    lastName: z.string().trim().min(1, "This field is required.").max(30),
    email: z.string().trim().email("Enter a valid email address."),
    password: z.string().min(8, "This password is too short. It must contain at least 8 characters."),
    confirmPassword: z.string(),
    phone: z.string().trim().max(15).optional().default(""),
  })
  .refine((data) => data.password === data.confirmPassword, {
    message: "The two password fields didn't match.",
    path: ["confirmPassword"],
  });

export type RegisterInput = z.infer<typeof RegisterInputSchema>;

export const LoginInputSchema = z.object({
  username: z.string().trim().min(1, "This field is required."),
  password: z.string().min(1, "This field is required."),
});

export type LoginInput = z.infer<typeof LoginInputSchema>;

export const toPublicAccount = ({ passwordHash: _passwordHash, ...account }: Account): PublicAccount =>
  account;
