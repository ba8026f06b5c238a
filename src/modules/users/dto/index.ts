export * from './change-password.dto';
export * from './update-profile.dto';
export * from './user.dto';
