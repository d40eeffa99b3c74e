// ============================================================
// /api/auth
// Register, login and logout
// ============================================================

import { Router } from 'express';
import type { Request, Response } from 'express';
import { z } from 'zod';
import { AuthError } from '../auth/provider';
import { readBearerToken } from '../session/manager';
import type { AppDeps } from '../app';

const MIN_PASSWORD_LENGTH = 6;

const RegisterBody = z.object({
  name: z.string().trim().catch(''),
  email: z.string().trim().catch(''),
  password: z.string().catch(''),
  confirmPassword: z.string().catch(''),
});

const LoginBody = z.object({
  email: z.string().trim().catch(''),
  password: z.string().catch(''),
});

// ------------------------------------------------------------------
// POST /api/auth/register
// ------------------------------------------------------------------

export function handleRegister(deps: AppDeps) {
  return async (req: Request, res: Response): Promise<void> => {
    try {
      const { name, email, password, confirmPassword } = RegisterBody.parse(bodyOf(req));

      if (!name || !email || !password || !confirmPassword) {
        res.status(400).json({ error: 'Please fill in all fields' });
        return;
      }
      if (password !== confirmPassword) {
        res.status(400).json({ error: 'Passwords do not match' });
        return;
      }
      if (password.length < MIN_PASSWORD_LENGTH) {
        res.status(400).json({ error: `Password must be at least ${MIN_PASSWORD_LENGTH} characters long` });
        return;
      }

      const user = await deps.identity.signUp({ name, email, password });
      res.status(201).json({ user, message: 'Registration successful! You can now log in.' });
    } catch (err) {
      if (err instanceof AuthError && err.code === 'EMAIL_TAKEN') {
        res.status(409).json({ error: 'An account with this email already exists' });
        return;
      }
      console.error('[auth] Registration error:', err instanceof Error ? err.message : err);
      res.status(500).json({ error: 'Registration failed. Please try again.' });
    }
  };
}

// ------------------------------------------------------------------
// POST /api/auth/login
// ------------------------------------------------------------------

export function handleLogin(deps: AppDeps) {
  return async (req: Request, res: Response): Promise<void> => {
    try {
      const { email, password } = LoginBody.parse(bodyOf(req));

      if (!email || !password) {
        res.status(400).json({ error: 'Please enter both email and password' });
        return;
      }

      const user = await deps.identity.signIn(email, password);
      const session = deps.sessions.createAuthenticated(user);
      res.json({ token: session.token, mode: session.context.mode, user });
    } catch (err) {
      if (err instanceof AuthError) {
        res.status(401).json({ error: 'Login failed. Please check your credentials.' });
        return;
      }
      console.error('[auth] Login error:', err instanceof Error ? err.message : err);
      res.status(500).json({ error: 'Login failed. Please try again.' });
    }
  };
}

// ------------------------------------------------------------------
// POST /api/auth/logout
// ------------------------------------------------------------------

export function handleLogout(deps: AppDeps) {
  return (req: Request, res: Response): void => {
    const token = readBearerToken(req.headers.authorization);
    if (token) {
      deps.sessions.destroy(token);
    }
    res.status(204).end();
  };
}

function bodyOf(req: Request): unknown {
  return typeof req.body === 'object' && req.body !== null ? req.body : {};
}

export function createAuthRouter(deps: AppDeps): Router {
  const router = Router();
  router.post('/register', handleRegister(deps));
  router.post('/login', handleLogin(deps));
  router.post('/logout', handleLogout(deps));
  return router;
}
