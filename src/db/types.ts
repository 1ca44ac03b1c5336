export type UserRole = 'admin' | 'staff';

export interface UserRecord {
  id: number;
  username: string;
  passwordHash: string;
  role: UserRole;
  createdAt: string;
}

export type FlashCategory = 'success' | 'info' | 'danger';

export interface FlashMessage {
  category: FlashCategory;
  message: string;
}

export interface SessionRecord {
  id: number;
  token: string;
  userId: number | null;
  csrfToken: string | null;
  flashes: FlashMessage[];
  expiresAt: string;
  createdAt: string;
}

export interface StudentRecord {
  id: number;
  studentId: string;
  name: string;
  department: string;
  email: string | null;
  phone: string | null;
  createdAt: string;
}
