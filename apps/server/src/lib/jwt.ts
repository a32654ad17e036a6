import jwt from "jsonwebtoken";
import { z } from "zod";
import { env } from "../config/env";

const studentPayloadSchema = z.object({
  sub: z.string().regex(/^\d+$/),
  typ: z.literal("student")
});

type StudentPayload = z.infer<typeof studentPayloadSchema>;

// Student tokens are issued once at registration and reused, so they carry no expiry.
export const signStudentToken = (userId: number): string => {
  const payload: StudentPayload = { sub: String(userId), typ: "student" };
  return jwt.sign(payload, env.JWT_SECRET, { algorithm: "HS256" });
};

export const verifyStudentToken = (token: string): StudentPayload => {
  return studentPayloadSchema.parse(jwt.verify(token, env.JWT_SECRET, { algorithms: ["HS256"] }));
};
