import { z } from 'zod';

// ip-api.com answers 200 with status "fail" for private or reserved addresses
export const IpApiResponse = z.object({
  status: z.string().optional(),
  message: z.string().optional(),
  city: z.string().nullable().optional(),
  country: z.string().nullable().optional(),
});
export type IpApiResponseT = z.infer<typeof IpApiResponse>;
