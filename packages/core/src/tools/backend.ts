import { z } from 'zod'

export const SubscriptionSchema = z.object({
  id: z.string(),
  customerId: z.string(),
  status: z.enum(['active', 'paused', 'cancelled']),
  plan: z.string(),
  frequency: z.enum(['monthly', 'bimonthly', 'quarterly']),
  nextChargeDate: z.string().nullable(),
  pausedUntil: z.string().nullable().optional(),
})

export const TrackingInfoSchema = z.object({
  trackingNumber: z.string(),
  carrier: z.string(),
  status: z.enum([
    'label_created',
    'in_transit',
    'out_for_delivery',
    'delivered',
    'exception',
  ]),
  statusDescription: z.string(),
  estimatedDelivery: z.string().nullable(),
  trackingUrl: z.string().nullable(),
})

export const PaymentSchema = z.object({
  id: z.string(),
  amount: z.number(),
  currency: z.string(),
  status: z.enum(['paid', 'refunded', 'failed', 'pending']),
  date: z.string(),
})

export const PaymentHistorySchema = z.object({
  payments: z.array(PaymentSchema),
})

export const CustomerHistorySchema = z.object({
  customerSince: z.string(),
  boxesReceived: z.number().int(),
  lifetimeValue: z.number(),
  previousContacts: z.number().int(),
  previousDamageClaims: z.number().int().default(0),
})

export const BoxContentsSchema = z.object({
  month: z.string(),
  items: z.array(z.string()),
})

export const MutationResultSchema = z.object({
  confirmationId: z.string().optional(),
  message: z.string(),
  details: z.record(z.string(), z.unknown()).default({}),
})

export type Subscription = z.infer<typeof SubscriptionSchema>
export type TrackingInfo = z.infer<typeof TrackingInfoSchema>
export type Payment = z.infer<typeof PaymentSchema>
export type PaymentHistory = z.infer<typeof PaymentHistorySchema>
export type CustomerHistory = z.infer<typeof CustomerHistorySchema>
export type BoxContents = z.infer<typeof BoxContentsSchema>
export type MutationResult = z.infer<typeof MutationResultSchema>

export type SubscriptionFrequency = Subscription['frequency']

/**
 * The commerce system behind the subscription box: subscriptions, shipments,
 * payments and claims. Lookups are read-only; the rest change customer data
 * and only run after human approval.
 */
export interface CommerceBackend {
  getSubscription(customerId: string): Promise<Subscription>
  trackPackage(customerId: string): Promise<TrackingInfo>
  getPaymentHistory(customerId: string): Promise<PaymentHistory>
  getCustomerHistory(customerId: string): Promise<CustomerHistory>
  getBoxContents(customerId: string): Promise<BoxContents>

  pauseSubscription(customerId: string, months: number): Promise<MutationResult>
  skipMonth(customerId: string): Promise<MutationResult>
  changeFrequency(
    customerId: string,
    frequency: SubscriptionFrequency
  ): Promise<MutationResult>
  changeAddress(customerId: string, newAddress: string): Promise<MutationResult>
  createDamageClaim(
    customerId: string,
    description: string
  ): Promise<MutationResult>
}
