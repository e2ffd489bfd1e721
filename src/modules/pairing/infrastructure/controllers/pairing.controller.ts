import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  Post,
  UseGuards,
} from '@nestjs/common';
import {
  ApiBearerAuth,
  ApiOperation,
  ApiResponse as ApiDocResponse,
  ApiSecurity,
  ApiTags,
} from '@nestjs/swagger';
import { Throttle, ThrottlerGuard } from '@nestjs/throttler';

import { ApiResponse } from '../../../../common/types/api-response.type';
import { JwtAuthGuard } from '../../../auth/guards/jwt-auth.guard';
import { PairingService } from '../../application/pairing.service';
import {
  GenerateCodeDto,
  GeneratedCodeDto,
  PairedChildDto,
  PairingCodeStatusDto,
  PairingResultDto,
  SubmitCodeDto,
} from '../../dto/pairing.dto';

@Controller('pairing')
@ApiTags('Pairing')
@ApiBearerAuth('Bearer Token')
@ApiSecurity('x-api-key')
@UseGuards(JwtAuthGuard)
export class PairingController {
  constructor(private readonly pairingService: PairingService) {}

  /**
   * ============================================
   * Dispositivo hijo
   * ============================================
   */

  @Post('codes')
  @HttpCode(HttpStatus.CREATED)
  @ApiOperation({
    summary: 'Generar código de emparejamiento',
    description: 'El hijo obtiene un código de 6 dígitos válido durante 10 minutos.',
  })
  @ApiDocResponse({ status: HttpStatus.CREATED, type: GeneratedCodeDto })
  @ApiDocResponse({ status: HttpStatus.UNAUTHORIZED, description: 'No autenticado' })
  async generateCode(@Body() dto: GenerateCodeDto): Promise<ApiResponse<GeneratedCodeDto>> {
    return this.pairingService.generateCode(dto);
  }

  @Get('codes/:code')
  @ApiOperation({ summary: 'Consultar el estado de un código propio' })
  @ApiDocResponse({ status: HttpStatus.OK, type: PairingCodeStatusDto })
  @ApiDocResponse({ status: HttpStatus.NOT_FOUND, description: 'Código inexistente' })
  async getCodeStatus(@Param('code') code: string): Promise<ApiResponse<PairingCodeStatusDto>> {
    return this.pairingService.getCodeStatus(code);
  }

  /**
   * ============================================
   * Dispositivo padre
   * ============================================
   */

  @Post('submit')
  @HttpCode(HttpStatus.CREATED)
  @UseGuards(ThrottlerGuard)
  @Throttle({ default: { limit: 5, ttl: 60_000 } })
  @ApiOperation({
    summary: 'Enviar código de emparejamiento',
    description: 'Crea la relación padre ↔ hijo de forma atómica.',
  })
  @ApiDocResponse({ status: HttpStatus.CREATED, type: PairingResultDto })
  @ApiDocResponse({ status: HttpStatus.BAD_REQUEST, description: 'Formato de código inválido' })
  @ApiDocResponse({ status: HttpStatus.NOT_FOUND, description: 'Código inexistente o ya usado' })
  @ApiDocResponse({ status: HttpStatus.GONE, description: 'Código expirado' })
  @ApiDocResponse({ status: HttpStatus.CONFLICT, description: 'Ya emparejado' })
  async submitCode(@Body() dto: SubmitCodeDto): Promise<ApiResponse<PairingResultDto>> {
    return this.pairingService.pair(dto.code);
  }

  @Get('children')
  @ApiOperation({ summary: 'Listar hijos emparejados' })
  @ApiDocResponse({ status: HttpStatus.OK, type: [PairedChildDto] })
  async listChildren(): Promise<ApiResponse<PairedChildDto[]>> {
    return this.pairingService.listChildren();
  }

  /**
   * ============================================
   * Ambas partes
   * ============================================
   */

  @Delete('relationships/:id')
  @ApiOperation({ summary: 'Desvincular dispositivo (irreversible)' })
  @ApiDocResponse({ status: HttpStatus.OK, description: 'Relación desactivada' })
  @ApiDocResponse({ status: HttpStatus.FORBIDDEN, description: 'No es parte de la relación' })
  @ApiDocResponse({ status: HttpStatus.NOT_FOUND, description: 'Relación inexistente o inactiva' })
  async unpair(@Param('id') relationshipId: string): Promise<ApiResponse> {
    return this.pairingService.unpair(relationshipId);
  }
}
