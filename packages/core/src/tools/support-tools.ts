import { z } from 'zod'
import { createTool } from './create-tool'

const customerParams = z.object({
  customerId: z.string().min(1),
})

// ============================================================================
// Lookups: read-only, run without approval
// ============================================================================

export const getSubscription = createTool({
  name: 'get_subscription',
  description: 'Current subscription plan, status, frequency and next charge date',
  kind: 'lookup',
  requiresApproval: false,
  parameters: customerParams,
  execute: ({ customerId }, { backend }) => backend.getSubscription(customerId),
})

export const trackPackage = createTool({
  name: 'track_package',
  description: 'Carrier, status and estimated delivery of the latest shipment',
  kind: 'lookup',
  requiresApproval: false,
  parameters: customerParams,
  execute: ({ customerId }, { backend }) => backend.trackPackage(customerId),
})

export const getPaymentHistory = createTool({
  name: 'get_payment_history',
  description: 'Recent charges and refunds on the subscription',
  kind: 'lookup',
  requiresApproval: false,
  parameters: customerParams,
  execute: ({ customerId }, { backend }) =>
    backend.getPaymentHistory(customerId),
})

export const getCustomerHistory = createTool({
  name: 'get_customer_history',
  description: 'Tenure, boxes received, lifetime value and prior contacts',
  kind: 'lookup',
  requiresApproval: false,
  parameters: customerParams,
  execute: ({ customerId }, { backend }) =>
    backend.getCustomerHistory(customerId),
})

export const getBoxContents = createTool({
  name: 'get_box_contents',
  description: "Items in the customer's current box",
  kind: 'lookup',
  requiresApproval: false,
  parameters: customerParams,
  execute: ({ customerId }, { backend }) => backend.getBoxContents(customerId),
})

// ============================================================================
// Mutations: change customer data, always gated on approval
// ============================================================================

export const pauseSubscription = createTool({
  name: 'pause_subscription',
  description: 'Pause the subscription for a number of months',
  kind: 'mutation',
  requiresApproval: true,
  parameters: z.object({
    customerId: z.string().min(1),
    months: z.number().int().min(1).max(6).default(1),
  }),
  execute: ({ customerId, months }, { backend }) =>
    backend.pauseSubscription(customerId, months),
})

export const skipMonth = createTool({
  name: 'skip_month',
  description: 'Skip the next scheduled box',
  kind: 'mutation',
  requiresApproval: true,
  parameters: customerParams,
  execute: ({ customerId }, { backend }) => backend.skipMonth(customerId),
})

export const changeFrequency = createTool({
  name: 'change_frequency',
  description: 'Change how often boxes ship',
  kind: 'mutation',
  requiresApproval: true,
  parameters: z.object({
    customerId: z.string().min(1),
    frequency: z.enum(['monthly', 'bimonthly', 'quarterly']),
  }),
  execute: ({ customerId, frequency }, { backend }) =>
    backend.changeFrequency(customerId, frequency),
})

export const changeAddress = createTool({
  name: 'change_address',
  description: 'Update the shipping address for future boxes',
  kind: 'mutation',
  requiresApproval: true,
  parameters: z.object({
    customerId: z.string().min(1),
    newAddress: z.string().min(5).max(500),
  }),
  execute: ({ customerId, newAddress }, { backend }) =>
    backend.changeAddress(customerId, newAddress),
})

export const createDamageClaim = createTool({
  name: 'create_damage_claim',
  description: 'Open a damage claim for the latest box',
  kind: 'mutation',
  requiresApproval: true,
  parameters: z.object({
    customerId: z.string().min(1),
    description: z.string().min(1).max(2000),
  }),
  execute: ({ customerId, description }, { backend }) =>
    backend.createDamageClaim(customerId, description),
})

export const SUPPORT_TOOLS = [
  getSubscription,
  trackPackage,
  getPaymentHistory,
  getCustomerHistory,
  getBoxContents,
  pauseSubscription,
  skipMonth,
  changeFrequency,
  changeAddress,
  createDamageClaim,
] as const
