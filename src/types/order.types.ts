import { z } from 'zod';

// Zod schema for order input (HTTP body or CSV row)
export const OrderRequestSchema = z.object({
  client: z.string().trim().min(1, 'Client cannot be empty'),
  quantity: z.coerce.number().int('Quantity must be an integer').positive('Quantity must be positive'),
  destination: z.string().trim().min(1, 'Destination cannot be empty')
});

// TypeScript type inferred from schema
export type OrderRequest = z.infer<typeof OrderRequestSchema>;

export function formatValidationIssues(error: z.ZodError): string {
  return error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join(', ');
}
