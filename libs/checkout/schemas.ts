import { z } from 'zod';

/**
 * Client-generated channel ids are opaque but bounded: URL-safe, 8 to 64 characters.
 */
export const ChannelIdSchema = z.string().regex(/^[A-Za-z0-9_-]{8,64}$/, 'must be 8-64 URL-safe characters');

export const PurchaseIdSchema = z.string().uuid();

export const PhoneInputSchema = z.string().min(1).max(32);

export const CheckoutRequestSchema = z.object({
    phoneNumber: PhoneInputSchema,
    assetRef: z.string().min(1).max(64),
    channelId: ChannelIdSchema
});

export const RetryRequestSchema = z.object({
    purchaseId: PurchaseIdSchema,
    gatewayReference: z.string().min(1).max(64),
    phoneNumber: PhoneInputSchema
});

export const SessionRequestSchema = z.object({
    purchaseId: PurchaseIdSchema,
    phoneNumber: PhoneInputSchema
});

export const RecoveryRequestSchema = z.object({
    phoneNumber: PhoneInputSchema,
    purchaseDate: z.string().min(1).max(10)
});

export type CheckoutRequest = z.infer<typeof CheckoutRequestSchema>;
export type RetryRequest = z.infer<typeof RetryRequestSchema>;
