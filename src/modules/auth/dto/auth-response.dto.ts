import type { UserDTO } from '../../users/dto/user.dto';

export interface AccessTokenDTO {
  accessToken: string;
  tokenType: 'Bearer';
  expiresIn: number;
}

export interface AuthSessionDTO extends AccessTokenDTO {
  refreshToken: string;
  user: UserDTO;
}
