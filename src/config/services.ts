export const NATS_SERVICE = 'NATS_SERVICE';

export const ExtractorSubjects = {
  extract: 'po.extract',
  health: 'po.health',
} as const;

export const ExtractorEvents = {
  extracted: 'po.extracted',
} as const;
