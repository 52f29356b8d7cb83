import { Router } from "express";
import { createAuthController } from "../controllers/auth.controller";
import { createRequireAuth } from "../middlewares/auth.middleware";
import { AuthService } from "../services/auth.service";
import { asyncHandler } from "../utils/asyncHandler";

export const createAuthRoutes = (auth: AuthService) => {
  const router = Router();
  const controller = createAuthController(auth);
  const requireAuth = createRequireAuth(auth);

  router.post("/register", asyncHandler(controller.register));
  router.post("/login", asyncHandler(controller.loginForm));
  router.post("/login/json", asyncHandler(controller.loginJson));
  router.post("/refresh", asyncHandler(controller.refresh));
  router.post("/logout", asyncHandler(controller.logout));

  // bearer access token required
  router.get("/me", requireAuth, asyncHandler(controller.me));
  router.post("/logout-all", requireAuth, asyncHandler(controller.logoutAll));
  router.put("/change-password", requireAuth, asyncHandler(controller.changePassword));
  router.delete("/delete-account", requireAuth, asyncHandler(controller.deleteAccount));

  return router;
};
