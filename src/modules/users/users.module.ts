import { Module } from '@nestjs/common';
import { MongooseModule } from '@nestjs/mongoose';

import { INJECTION_TOKENS } from '../../common/constants/injection-tokens';
import { UsersService } from './application/users.service';
import { MongoDbUsersRepository } from './infrastructure/adapters/mongodb-users.repository';
import { ProfileController } from './infrastructure/controllers/profile.controller';
import {
  UserSchema,
  UserSchemaFactory,
} from './infrastructure/schemas/user.schema';

/**
 * Módulo de usuarios.
 *
 * - UsersService: perfil, contraseña (Argon2) y borrado lógico
 * - MongoDbUsersRepository: adaptador del puerto IUsersRepository
 *
 * Controladores:
 * - GET /profile, PATCH /profile, PUT /profile/password, DELETE /profile
 *
 * Exporta el repositorio para auth, devices, purchases y entitlements.
 */
@Module({
  imports: [
    MongooseModule.forFeature([
      { name: UserSchema.name, schema: UserSchemaFactory },
    ]),
  ],
  controllers: [ProfileController],
  providers: [
    UsersService,
    {
      provide: INJECTION_TOKENS.USERS_REPOSITORY,
      useClass: MongoDbUsersRepository,
    },
  ],
  exports: [UsersService, INJECTION_TOKENS.USERS_REPOSITORY],
})
export class UsersModule {}
