export * from './device-registration.dto';
export * from './register-device.dto';
