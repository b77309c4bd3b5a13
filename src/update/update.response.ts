import { ApiProperty } from '@nestjs/swagger';

export const NO_MATCH_MESSAGE = 'No services matched the provided image prefixes';

export class UpdateResponseDto {
  @ApiProperty({ example: 'Successfully updated 2 service(s)' })
  message!: string;

  @ApiProperty({ example: ['api', 'worker'], type: [String] })
  updated_services!: string[];
}

export function buildUpdateResponse(updatedServices: readonly string[]): UpdateResponseDto {
  if (updatedServices.length === 0) {
    return { message: NO_MATCH_MESSAGE, updated_services: [] };
  }
  return {
    message: `Successfully updated ${updatedServices.length} service(s)`,
    updated_services: [...updatedServices],
  };
}
