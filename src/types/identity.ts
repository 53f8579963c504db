export type IdentityRole = 'USER' | 'MANAGER' | 'FINAL_APPROVER' | 'ADMIN';

/** Profile of the authenticated warehouse session, as mirrored in the cache. */
export interface UserProfile {
  username: string;
  userId: number | null;
  employeeId: number | null;
  displayName: string | null;
  title: string | null;
  role: string | null;
  theater: string | null;
  industrySegment: string | null;
  managerId: number | null;
  managerName: string | null;
  approvalLevel: number;
  isFinalApprover: boolean;
}

export type Identity = Readonly<UserProfile>;

export type EffectiveUser = Identity & {
  isImpersonating: boolean;
  realUsername: string | null;
  isAdmin: boolean;
};

export type ImpersonationStatus =
  | { active: false }
  | { active: true; employeeId: number | null; displayName: string | null; title: string | null };
