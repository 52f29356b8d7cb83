import { Request } from "express";
import { DeviceInfo } from "../types/auth";

/**
 * Extract IP address from request
 */
export const getIpAddress = (req: Request): string | undefined => {
  const forwarded = req.headers["x-forwarded-for"];
  const firstForwarded = (Array.isArray(forwarded) ? forwarded[0] : forwarded)?.split(",")[0]?.trim();
  const realIp = req.headers["x-real-ip"];

  return (
    firstForwarded ||
    (typeof realIp === "string" ? realIp : undefined) ||
    req.socket.remoteAddress ||
    req.ip
  );
};

/**
 * Extract user agent from request
 */
export const getUserAgent = (req: Request): string | undefined => {
  return req.headers["user-agent"];
};

export const getDeviceInfo = (req: Request): DeviceInfo => ({
  userAgent: getUserAgent(req),
  ipAddress: getIpAddress(req),
});

export const getBearerToken = (req: Request): string | null => {
  const header = req.headers.authorization;
  if (!header?.startsWith("Bearer ")) return null;

  const token = header.slice("Bearer ".length).trim();
  return token || null;
};
