export const actorPost = {
  title: 'Actor Model',
  summary: 'Isolated state and mailboxes',
  content: 'Orleans grains process one message at a time.',
  tags: ['dotnet'],
  categories: ['architecture'],
  permalink: '/posts/actor-model/',
  date: '2021-03-04T10:00:00+00:00',
};

export const channelsPost = {
  title: 'Channels Deep Dive',
  summary: 'Producer and consumer pipelines',
  content: 'Bounded channels apply backpressure.',
  tags: ['actor-systems', 'concurrency'],
  categories: ['dotnet'],
  permalink: '/posts/channels/',
  date: '2022-11-20',
};

export const spanPost = {
  title: 'Span and Memory',
  summary: 'Slicing without allocations',
  content: 'Stack-only types and where they fit.',
  tags: ['performance'],
  categories: ['runtime'],
  permalink: '/posts/span/',
  date: '2020-01-15',
};

export const sampleIndex = [actorPost, channelsPost, spanPost];
