export * from './auth-response.dto';
export * from './login.dto';
export * from './refresh-token.dto';
export * from './signup.dto';
