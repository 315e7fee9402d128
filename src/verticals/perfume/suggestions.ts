// ---------------------------------------------------------------------------
// Perfume Creative Suggestions
// ---------------------------------------------------------------------------
// Fixed catalog the suggestion selector draws from. Order matters: the
// seeded shuffle is a function of both the ad name and this order.
// ---------------------------------------------------------------------------

export const PERFUME_SUGGESTIONS: readonly string[] = [
  "Test sensory-rich language in copy: emphasize notes (e.g., 'warm amber,' 'crisp citrus,' 'deep oud') to create olfactory imagination and emotional connection with the fragrance.",
  "Add short 2-3 second testimonial clips or user reaction shots (genuine surprise/delight expressions) to build social proof and convey the 'experience' of wearing the perfume.",
  "Create A/B test with lifestyle context: show the perfume in aspirational moments (date night, office confidence, evening out) vs. product-only shots to see which drives higher engagement.",
  "For Instagram Reels: front-load the bottle reveal within the first 2 seconds with dramatic lighting or slow-motion pour to capture attention before the algorithm decides to show your ad.",
  "Test urgency messaging for limited editions or seasonal scents: 'Only 200 bottles left' or 'Summer collection ending soon' can drive immediate action for premium perfumes.",
  "Leverage ASMR-style sound: include the 'click' of the bottle cap, spray sound, or subtle ambient music that complements the fragrance personality (elegant piano for floral, upbeat for citrus).",
  "Segment by occasion: run separate campaigns for 'everyday confidence' vs. 'special occasion luxury' with different creative angles and budget allocations based on performance.",
  "Include ingredient storytelling: if using premium/rare ingredients (saffron, rose absolute, jasmine sambac), highlight the craftsmanship to justify premium pricing and differentiate from mass-market options.",
  "Test influencer partnership clips: 2-3 second genuine reaction from a micro-influencer in your niche (fashion, lifestyle) can boost credibility and expand reach through their audience.",
  "Move CTA to the 60-70% mark instead of end-screen: viewers who watch past halfway are highly engaged; prompt them before they naturally drop off to maximize conversion capture.",
];
