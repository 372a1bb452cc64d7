import express, { Express, Request, Response } from 'express';
import { currentUser, requireAuthenticatedUser } from './auth-utils';
import { handleRouteError } from './errors';
import {
  activateAccountSchema,
  activateSchema,
  emailSchema,
  loginSchema,
  passwordResetSchema,
  passwordSchema,
  registerSchema,
  userInfoUpdateSchema,
  type UserService
} from './user-service';

export const createUserRouter = (userService: UserService) => {
  const router = express.Router();
  const requireAuth = requireAuthenticatedUser(userService);

  /**
   * Register a new account and mail its activation link
   * POST /auth/sign-up
   * Body: { email, userName, password }
   */
  router.post('/auth/sign-up', async (req: Request, res: Response): Promise<void> => {
    try {
      const userInfo = await userService.register(registerSchema.parse(req.body));
      res.status(201).json(userInfo);
    } catch (error) {
      handleRouteError(res, error, 'Sign-up');
    }
  });

  /**
   * POST /auth/sign-in
   * Body: { email, password }
   */
  router.post('/auth/sign-in', async (req: Request, res: Response): Promise<void> => {
    try {
      res.json(await userService.login(loginSchema.parse(req.body)));
    } catch (error) {
      handleRouteError(res, error, 'Sign-in');
    }
  });

  router.post('/auth/refresh', requireAuth, async (req: Request, res: Response): Promise<void> => {
    try {
      res.json(await userService.refreshToken(currentUser(req)));
    } catch (error) {
      handleRouteError(res, error, 'Token refresh');
    }
  });

  router.post('/user/update/info', requireAuth, async (req: Request, res: Response): Promise<void> => {
    try {
      res.json(await userService.updateUserInfo(currentUser(req), userInfoUpdateSchema.parse(req.body)));
    } catch (error) {
      handleRouteError(res, error, 'User info update');
    }
  });

  /**
   * Change the password of the signed-in user. The response carries a fresh
   * token because every previously issued one stops working.
   */
  router.post('/user/update/password', requireAuth, async (req: Request, res: Response): Promise<void> => {
    try {
      const { password } = passwordSchema.parse(req.body);
      res.json(await userService.modifyPassword(currentUser(req), password));
    } catch (error) {
      handleRouteError(res, error, 'Password update');
    }
  });

  router.post('/user/activate', requireAuth, async (req: Request, res: Response): Promise<void> => {
    try {
      await userService.activateUser(currentUser(req), activateSchema.parse(req.body));
      res.json({ status: 'activated' });
    } catch (error) {
      handleRouteError(res, error, 'User activation');
    }
  });

  router.post('/user/activate/request', requireAuth, async (req: Request, res: Response): Promise<void> => {
    try {
      await userService.sendEmailCode(currentUser(req));
      res.json({ status: 'sent' });
    } catch (error) {
      handleRouteError(res, error, 'Activation code request');
    }
  });

  /**
   * Target of the emailed activation link
   * GET /user/activateAccount?nonce=
   */
  router.get('/user/activateAccount', async (req: Request, res: Response): Promise<void> => {
    try {
      await userService.activateAccount(activateAccountSchema.parse(req.query));
      res.json({ status: 'activated' });
    } catch (error) {
      handleRouteError(res, error, 'Account activation');
    }
  });

  router.post('/user/password/reset_request', async (req: Request, res: Response): Promise<void> => {
    try {
      const { email } = emailSchema.parse(req.body);
      await userService.sendPasswordResetCode(email);
      res.json({ status: 'sent' });
    } catch (error) {
      handleRouteError(res, error, 'Password reset request');
    }
  });

  router.post('/user/password/reset', async (req: Request, res: Response): Promise<void> => {
    try {
      await userService.modifyPasswordByActiveCode(passwordResetSchema.parse(req.body));
      res.json({ status: 'reset' });
    } catch (error) {
      handleRouteError(res, error, 'Password reset');
    }
  });

  return router;
};

export const registerUserRoutes = (app: Express, userService: UserService): void => {
  app.use(createUserRouter(userService));
};
