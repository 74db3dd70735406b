import { z } from 'zod'
import { tool } from '../../src/tools/zod-tool.js'
import type { ContentApiClient } from '../../src/content-api/client.js'
import { toToolOutput } from '../../src/content-api/output.js'

/**
 * The part of the content API the blog tools call.
 */
export type BlogClient = Pick<
  ContentApiClient,
  'getBlogProfile' | 'listBlogPosts' | 'getBlogPost' | 'createBlogPost' | 'updateBlogPost' | 'uploadImage'
>

const blogId = z.number().int().describe('Blog post identifier')

const postSchema = z.object({
  title: z.string(),
  content: z.string().describe('Markdown body'),
  is_public: z.boolean().default(true),
  tags: z.string().default('').describe('Comma-separated tags'),
})

/**
 * Creates the tools for reading and writing blog posts.
 *
 * Blog responses are returned as the service sends them.
 */
export function createBlogTools(client: BlogClient) {
  const getBlogProfile = tool({
    name: 'get_blog_profile',
    description: 'Gets the blog profile of the token owner.',
    inputSchema: z.object({}),
    callback: async () => toToolOutput(await client.getBlogProfile()),
  })

  const getBlogList = tool({
    name: 'get_blog_list',
    description: 'Lists blog posts one result page at a time.',
    inputSchema: z.object({
      page: z.number().int().min(1).default(1).describe('Result page, starting at 1'),
    }),
    callback: async (input) => toToolOutput(await client.listBlogPosts(input.page)),
  })

  const getBlogPost = tool({
    name: 'get_blog_post',
    description: 'Gets one blog post by its identifier.',
    inputSchema: z.object({ blog_id: blogId }),
    callback: async (input) => toToolOutput(await client.getBlogPost(input.blog_id)),
  })

  const createBlogPost = tool({
    name: 'create_blog_post',
    description: 'Creates a blog post. Title and content are required; visibility and tags are optional.',
    inputSchema: postSchema,
    callback: async (input) =>
      toToolOutput(
        await client.createBlogPost({
          title: input.title,
          content: input.content,
          isPublic: input.is_public,
          tags: input.tags,
        })
      ),
  })

  const updateBlogPost = tool({
    name: 'update_blog_post',
    description: 'Replaces the title, content, visibility and tags of an existing blog post.',
    inputSchema: postSchema.extend({ blog_id: blogId }),
    callback: async (input) =>
      toToolOutput(
        await client.updateBlogPost(input.blog_id, {
          title: input.title,
          content: input.content,
          isPublic: input.is_public,
          tags: input.tags,
        })
      ),
  })

  const uploadBlogImage = tool({
    name: 'upload_blog_image',
    description: 'Uploads an image file from the local disk and attaches it to a blog post.',
    inputSchema: z.object({
      blog_id: blogId,
      file_path: z.string().describe('Path of the image on the local disk'),
    }),
    callback: async (input) => toToolOutput(await client.uploadImage('blog', input.blog_id, input.file_path)),
  })

  return { getBlogProfile, getBlogList, getBlogPost, createBlogPost, updateBlogPost, uploadBlogImage }
}

export type BlogTools = ReturnType<typeof createBlogTools>
