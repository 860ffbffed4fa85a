import { z } from 'zod';

/**
 * `css`, `css::text`, `css::html` or `css::attr(name)`; or the object form.
 */
const ExtractionRuleSchema = z.union([
  z.string().min(1),
  z.object({
    selector: z.string().min(1),
    attr: z.string().optional(),
    html: z.boolean().default(false),
    all: z.boolean().default(false),
  }),
]);

const httpUrl = z
  .string()
  .url()
  .refine((u) => /^https?:\/\//i.test(u), { message: 'Must be an http(s) URL' });

const isoDay = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Use YYYY-MM-DD');

/** One template, or several walked one after another (e.g. one per section). */
const ListingSchema = z.object({
  url_template: z.union([z.string().min(1), z.array(z.string().min(1)).nonempty()]),
  start_page: z.number().int().min(0).default(1),
  step: z.number().int().positive().default(1),
  start_url: httpUrl.optional(),
});

const PaginationSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('template'),
  }),
  z.object({
    type: z.literal('link'),
    next_selector: ExtractionRuleSchema,
  }),
  z.object({
    type: z.literal('token'),
    token_selector: ExtractionRuleSchema.optional(),
    token_header: z.string().optional(),
    token_param: z.string().default('page'),
    token_sentinel: z.string().optional(),
  }),
  z.object({
    type: z.literal('archive'),
    date_format: z.enum(['monthly', 'daily']).default('monthly'),
    start_date: isoDay,
    /** Defaults to today. */
    end_date: isoDay.optional(),
    /** Zero-pad `{month}` and `{day}`. */
    pad: z.boolean().default(false),
  }),
]);

const SelectorsSchema = z.object({
  item: z.string().min(1),
  title: ExtractionRuleSchema,
  url: ExtractionRuleSchema,
  date: ExtractionRuleSchema.optional(),
  guid: ExtractionRuleSchema.optional(),
  image: ExtractionRuleSchema.optional(),
  article_title: ExtractionRuleSchema.optional(),
  article_date: ExtractionRuleSchema.optional(),
  article_body: ExtractionRuleSchema.optional(),
  tags: ExtractionRuleSchema.optional(),
});

export const CLEANER_NAMES = [
  'clean_title',
  'clean_html_text',
  'normalize_date',
  'normalize_tags',
  'clean_url',
  'join_body',
] as const;

export const SiteDescriptorSchema = z
  .object({
    source_id: z.string().regex(/^[a-z0-9_]+$/, 'Use lowercase letters, digits and underscores'),
    name: z.string().min(1),
    country: z
      .string()
      .trim()
      .length(2, 'Country must be a 2-letter ISO code')
      .transform((c) => c.toUpperCase()),
    base_url: httpUrl,
    listing: ListingSchema,
    selectors: SelectorsSchema,
    fields: z.record(ExtractionRuleSchema).default({}),
    pagination: PaginationSchema.default({ type: 'template' }),
    cleaning: z.record(z.enum(CLEANER_NAMES)).default({}),
    rate_limit: z
      .object({
        min_delay_ms: z.number().min(0).optional(),
        max_concurrent: z.number().int().positive().optional(),
      })
      .default({}),
    max_pages: z.number().int().positive().optional(),
    /** Sent with every listing and detail request of this source. */
    headers: z.record(z.string()).default({}),
    cookies: z.record(z.string()).default({}),
  })
  .superRefine((d, ctx) => {
    const templates = listingTemplates(d);
    const template = templates[0];
    const placeholder = (name: string, i: number): void =>
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['listing', 'url_template', ...(typeof d.listing.url_template === 'string' ? [] : [i])],
        message: `${d.pagination.type} pagination needs a {${name}} placeholder`,
      });

    if (templates.length > 1 && d.pagination.type !== 'template') {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['listing', 'url_template'],
        message: 'Only template pagination takes a list of url templates',
      });
    }
    if (d.pagination.type === 'template') {
      templates.forEach((t, i) => {
        if (!t.includes('{num}')) placeholder('num', i);
      });
    }
    if (d.pagination.type === 'archive') {
      const required = d.pagination.date_format === 'daily' ? ['year', 'month', 'day'] : ['year', 'month'];
      for (const name of required) {
        if (!template.includes(`{${name}}`)) placeholder(name, 0);
      }
      if (d.pagination.end_date && d.pagination.end_date < d.pagination.start_date) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['pagination', 'end_date'],
          message: 'end_date must not be earlier than start_date',
        });
      }
    }
    if (d.pagination.type === 'token') {
      if (!d.pagination.token_selector && !d.pagination.token_header) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['pagination'],
          message: 'Token pagination needs token_selector or token_header',
        });
      }
      if (template.includes('{token}') && !d.listing.start_url) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['listing', 'start_url'],
          message: 'A {token} template needs a start_url for the first page',
        });
      }
    }
  });

export type SiteDescriptor = z.infer<typeof SiteDescriptorSchema>;

export function listingTemplates(d: { listing: z.infer<typeof ListingSchema> }): [string, ...string[]] {
  const { url_template } = d.listing;
  return typeof url_template === 'string' ? [url_template] : url_template;
}
export type ExtractionRule = z.infer<typeof ExtractionRuleSchema>;
export type PaginationRule = SiteDescriptor['pagination'];
export type CleanerName = (typeof CLEANER_NAMES)[number];
