import { ApiProperty } from '@nestjs/swagger';

/** Error body inside the standard envelope. */
export interface ApiErrorBody {
  code: string;
  message: string;
  retryable: boolean;
  details?: unknown;
}

/** Standard response envelope: { success, result?, error? }. */
export class ApiResponseDto<T = unknown> {
  @ApiProperty({ example: true })
  success!: boolean;

  @ApiProperty({ required: false })
  result?: T;

  @ApiProperty({ required: false })
  error?: ApiErrorBody;
}

/** Factory for success response. */
export function apiSuccess<T>(result: T): ApiResponseDto<T> {
  return { success: true, result };
}

/** Factory for error response. */
export function apiFailure(error: ApiErrorBody): ApiResponseDto<never> {
  return { success: false, error };
}
