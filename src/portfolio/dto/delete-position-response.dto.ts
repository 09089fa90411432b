export interface DeletePositionResponseDto {
  message: string;
  ticker: string;             // ticker of the removed position
  remaining: number;          // positions left after the delete
}
