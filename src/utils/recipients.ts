import User, { UserRole } from '../models/User';

// Admins and stock managers receive stock alerts and reports
export const REPORT_RECIPIENT_ROLES: UserRole[] = ['admin', 'manager'];

export const getReportRecipients = async (): Promise<string[]> => {
  const users = await User.find({ isActive: true, role: { $in: REPORT_RECIPIENT_ROLES } }).select('email');

  return [...new Set(users.map(user => user.email).filter((email): email is string => Boolean(email)))];
};
