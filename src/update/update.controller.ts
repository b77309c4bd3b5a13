import { All, Body, Controller, MethodNotAllowedException, Put, UseGuards } from '@nestjs/common';
import { ApiBearerAuth, ApiExcludeEndpoint, ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { UpdateRequestDto } from './dto/update-request.dto';
import { UpdateTokenGuard } from './guards/update-token.guard';
import { buildUpdateResponse, UpdateResponseDto } from './update.response';
import { UpdateService } from './update.service';

@ApiTags('update')
@Controller('update')
export class UpdateController {
  constructor(private readonly updateService: UpdateService) {}

  @Put()
  @UseGuards(UpdateTokenGuard)
  @ApiBearerAuth()
  @ApiOperation({ summary: 'Actualizar el tag de imagen de los servicios que coinciden y redeployarlos' })
  @ApiResponse({ status: 200, description: 'Servicios actualizados (o ninguno coincidió)', type: UpdateResponseDto })
  @ApiResponse({ status: 400, description: 'Body inválido' })
  @ApiResponse({ status: 401, description: 'Token de autorización inválido o faltante' })
  @ApiResponse({
    status: 500,
    description: 'Falló una llamada a Railway; incluye los servicios ya actualizados',
    schema: {
      type: 'object',
      properties: {
        error: { type: 'string' },
        updated_services: { type: 'array', items: { type: 'string' } },
      },
    },
  })
  async update(@Body() updateRequestDto: UpdateRequestDto): Promise<UpdateResponseDto> {
    const updatedServices = await this.updateService.updateServices(updateRequestDto);
    return buildUpdateResponse(updatedServices);
  }

  // Declarado después de @Put: solo recibe los demás métodos
  @All()
  @ApiExcludeEndpoint()
  rejectMethod(): never {
    throw new MethodNotAllowedException('Method not allowed, use PUT');
  }
}
