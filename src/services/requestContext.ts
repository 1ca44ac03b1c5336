import { FlashCategory, FlashMessage, SessionRecord, UserRole } from '../db/types';
import { generateCsrfToken, tokensMatch } from '../utils/token';
import { AuthUser } from './authService';
import { endSession, saveCsrfToken, saveFlashes, startSession } from './sessionService';

export interface SessionCookieJar {
  issue(session: SessionRecord): void;
  clear(): void;
}

/**
 * Per-request view of the visitor's session. Handlers receive it explicitly
 * through `requestContext(req)`; a session row is only written once something
 * needs one (a CSRF token, a notice or a sign-in).
 */
export class RequestContext {
  private session: SessionRecord | undefined;
  private currentUser: AuthUser | undefined;

  constructor(
    private readonly cookies: SessionCookieJar,
    resumed?: { session: SessionRecord; user?: AuthUser }
  ) {
    this.session = resumed?.session;
    this.currentUser = resumed?.user;
  }

  get user(): AuthUser | undefined {
    return this.currentUser;
  }

  hasRole(role: UserRole): boolean {
    return this.currentUser?.role === role;
  }

  csrfToken(): string {
    const session = this.ensureSession();
    if (session.csrfToken) {
      return session.csrfToken;
    }
    const token = generateCsrfToken();
    this.session = saveCsrfToken(session, token);
    return token;
  }

  verifyCsrfToken(candidate: string): boolean {
    const expected = this.session?.csrfToken;
    if (!expected || !candidate) {
      return false;
    }
    return tokensMatch(expected, candidate);
  }

  flash(message: string, category: FlashCategory = 'info') {
    const session = this.ensureSession();
    this.session = saveFlashes(session, [...session.flashes, { category, message }]);
  }

  takeFlashes(): FlashMessage[] {
    const session = this.session;
    if (!session || session.flashes.length === 0) {
      return [];
    }
    this.session = saveFlashes(session, []);
    return session.flashes;
  }

  /** Replaces whatever session the visitor had with a fresh one bound to `user`. */
  signIn(user: AuthUser) {
    this.discardSession();
    this.session = startSession(user.id);
    this.currentUser = user;
    this.cookies.issue(this.session);
  }

  signOut() {
    this.discardSession();
    this.currentUser = undefined;
    this.cookies.clear();
  }

  private discardSession() {
    if (this.session) {
      endSession(this.session.token);
      this.session = undefined;
    }
  }

  private ensureSession(): SessionRecord {
    if (this.session) {
      return this.session;
    }
    const session = startSession(this.currentUser?.id ?? null);
    this.session = session;
    this.cookies.issue(session);
    return session;
  }
}
