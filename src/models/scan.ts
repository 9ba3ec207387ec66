export interface CardScanEvent {
  cardId: string;
  observedAt: Date;
}
