import { ApiProperty } from '@nestjs/swagger';
import { ArrayNotEmpty, IsArray, IsNotEmpty, IsString } from 'class-validator';
import { IsUuidLike } from '../validators/is-uuid-like.validator';

export class UpdateRequestDto {
  @ApiProperty({
    example: '550e8400-e29b-41d4-a716-446655440000',
    description: 'ID del proyecto en Railway',
    format: 'uuid',
  })
  @IsUuidLike({ message: 'Invalid project_id: must be a valid UUID' })
  project_id!: string;

  @ApiProperty({
    example: '6ba7b810-9dad-11d1-80b4-00c04fd430c8',
    description: 'ID del entorno cuyos servicios se actualizan',
    format: 'uuid',
  })
  @IsUuidLike({ message: 'Invalid environment_id: must be a valid UUID' })
  environment_id!: string;

  @ApiProperty({
    example: ['ghcr.io/acme/api', 'ghcr.io/acme/worker'],
    description: 'Prefijos de imagen; se actualiza todo servicio cuya imagen empiece con alguno',
    type: [String],
  })
  @IsString({ each: true, message: 'image_prefixes must contain only non-empty strings' })
  @IsNotEmpty({ each: true, message: 'image_prefixes must contain only non-empty strings' })
  @IsArray({ message: 'image_prefixes must be a list of strings' })
  // Los decoradores corren de abajo hacia arriba: una lista ausente o null cae acá primero
  @ArrayNotEmpty({ message: 'image_prefixes cannot be empty' })
  image_prefixes!: string[];

  @ApiProperty({ example: 'v1.4.2', description: 'Tag que reemplaza al actual' })
  @IsString({ message: 'new_version must be a string' })
  @IsNotEmpty({ message: 'new_version cannot be empty' })
  new_version!: string;
}
